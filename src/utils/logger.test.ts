import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let writeSpy: MockInstance;

  beforeEach(() => {
    writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    writeSpy.mockRestore();
  });

  function outputs(): string[] {
    return writeSpy.mock.calls.map((call: unknown[]) => String(call[0]));
  }

  function parseOutput(index: number): unknown {
    const output = outputs()[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim());
  }

  describe('unserializable data', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });

      const circular: Record<string, unknown> = { name: 'test' };
      circular.self = circular;

      expect(() => {
        logger.info('circular_test', circular);
      }).not.toThrow();

      expect(outputs()).toHaveLength(1);
      expect(parseOutput(0)).toMatchObject({
        level: 'info',
        component: 'TestLogger',
        event: 'circular_test',
        originalData: '[unserializable]',
      });
      expect(parseOutput(0)).toHaveProperty('serializationError', expect.any(String));
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.warn('bigint_test', { value: 75n });

      expect(parseOutput(0)).toMatchObject({
        level: 'warn',
        event: 'bigint_test',
        originalData: '[unserializable]',
      });
      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('should write a single line even when serialization fails', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.error('bigint_test', { nested: { value: 1n } });

      const output = outputs()[0] ?? '';
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n')).toHaveLength(1);
    });

    it('should never throw for arbitrary data', () => {
      const logger = new Logger({ component: 'PropertyLogger' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (data) => {
          logger.info('property_test', data);
          return true;
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages with their data', () => {
      const logger = new Logger({ component: 'LabelParser' });

      logger.info('label_parsed', { statements: 3 });

      expect(parseOutput(0)).toMatchObject({
        level: 'info',
        component: 'LabelParser',
        event: 'label_parsed',
        data: { statements: 3 },
      });
      expect(parseOutput(0)).toHaveProperty('timestamp', expect.any(String));
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'LabelParser' });

      logger.warn('no_data');

      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'LabelParser' });

      logger.debug('hidden');

      expect(outputs()).toEqual([]);
      expect(logger.isDebugEnabled).toBe(false);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'LabelParser', debugMode: true });

      logger.debug('visible', { line: 2 });

      expect(parseOutput(0)).toMatchObject({ level: 'debug', event: 'visible', data: { line: 2 } });
    });

    it('should log error messages', () => {
      const logger = new Logger({ component: 'Serializer' });

      logger.error('render_failed');

      expect(parseOutput(0)).toMatchObject({ level: 'error', component: 'Serializer' });
    });
  });

  describe('child', () => {
    it('should keep the debug setting under a new component name', () => {
      const child = new Logger({ component: 'root', debugMode: true }).child('LabelWriter');

      child.debug('nested');

      expect(child.isDebugEnabled).toBe(true);
      expect(parseOutput(0)).toMatchObject({ component: 'LabelWriter', event: 'nested' });
    });
  });
});
