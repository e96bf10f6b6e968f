/**
 * Label rendering.
 *
 * Each container is laid out independently: the `=` signs of sibling lines
 * line up one space past the longest key in that container, counting the
 * `END_GROUP` and `END_OBJECT` lines that close nested blocks. Nested blocks
 * are indented by `indentWidth` spaces per level.
 *
 * @packageDocumentation
 */

import { DEFAULT_RENDER_OPTIONS, LINE_TERMINATORS } from '../config/defaults.js';
import type { RenderOptions } from '../config/types.js';
import { assertRenderOptionsValid } from '../config/validator.js';
import { SerializationError } from '../errors/index.js';
import type { Label, Statement } from '../statements/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { assertNever, formatValue } from '../values/index.js';

/**
 * Options for {@link render} and {@link renderToString}.
 */
export interface RenderCallOptions extends Partial<RenderOptions> {
  /** Receives `label_rendered` and `label_render_failed` debug events. */
  readonly logger?: Logger;
}

function openingKey(statement: Statement): string {
  switch (statement.kind) {
    case 'attribute':
      return statement.identifier.text;
    case 'group':
      return 'GROUP';
    case 'object':
      return 'OBJECT';
    default:
      return assertNever(statement, 'statement kind');
  }
}

function closingKey(statement: Statement): string | undefined {
  switch (statement.kind) {
    case 'attribute':
      return undefined;
    case 'group':
      return 'END_GROUP';
    case 'object':
      return 'END_OBJECT';
    default:
      return assertNever(statement, 'statement kind');
  }
}

class LabelWriter {
  private readonly lines: string[] = [];

  constructor(private readonly options: RenderOptions) {}

  write(label: Label): string {
    this.writeContainer(label, 0);
    this.lines.push('END');
    const terminator = LINE_TERMINATORS[this.options.lineEnding];
    const text = this.lines.join(terminator);
    return this.options.finalNewline ? text + terminator : text;
  }

  private writeContainer(statements: Iterable<Statement>, depth: number): void {
    const items = Array.from(statements);
    let width = this.options.minKeyWidth;
    for (const statement of items) {
      width = Math.max(width, openingKey(statement).length, closingKey(statement)?.length ?? 0);
    }

    const indent = ' '.repeat(depth * this.options.indentWidth);
    for (const statement of items) {
      this.writeStatement(statement, indent, width, depth);
    }
  }

  private writeStatement(statement: Statement, indent: string, width: number, depth: number): void {
    const line = (key: string, value: string): void => {
      this.lines.push(`${indent}${key.padEnd(width)} = ${value}`);
    };

    switch (statement.kind) {
      case 'attribute': {
        let value: string;
        try {
          value = formatValue(statement.value);
        } catch (error) {
          if (error instanceof SerializationError) {
            throw new SerializationError(error.message, statement.identifier.text);
          }
          throw error;
        }
        line(statement.identifier.text, value);
        return;
      }
      case 'group':
        line('GROUP', statement.identifier.text);
        this.writeContainer(statement.statements, depth + 1);
        line('END_GROUP', statement.identifier.text);
        return;
      case 'object':
        line('OBJECT', statement.identifier.text);
        this.writeContainer(statement.statements, depth + 1);
        line('END_OBJECT', statement.identifier.text);
        return;
      default:
        assertNever(statement, 'statement kind');
    }
  }
}

function resolveOptions(options: RenderCallOptions): RenderOptions {
  return {
    lineEnding: options.lineEnding ?? DEFAULT_RENDER_OPTIONS.lineEnding,
    indentWidth: options.indentWidth ?? DEFAULT_RENDER_OPTIONS.indentWidth,
    minKeyWidth: options.minKeyWidth ?? DEFAULT_RENDER_OPTIONS.minKeyWidth,
    finalNewline: options.finalNewline ?? DEFAULT_RENDER_OPTIONS.finalNewline,
  };
}

/**
 * Renders `label` as text, ending with the `END` line.
 *
 * @param label - The label to render.
 * @param options - Layout options and an optional logger.
 * @returns The label text.
 * @throws ConfigValidationError if a width is negative or fractional, or the
 * line ending is unknown.
 * @throws SerializationError if any sequence in the tree has no elements.
 *
 * @example
 * ```typescript
 * const label = Statements.label([new Attribute('PDS_VERSION_ID', new IdentifierValue('PDS3'))]);
 * renderToString(label, { lineEnding: 'lf' });
 * // 'PDS_VERSION_ID = PDS3\nEND\n'
 * ```
 */
export function renderToString(label: Label, options: RenderCallOptions = {}): string {
  const log = options.logger ?? defaultLogger;
  const resolved = resolveOptions(options);
  assertRenderOptionsValid(resolved);
  try {
    const text = new LabelWriter(resolved).write(label);
    log.debug('label_rendered', { statements: label.length, characters: text.length });
    return text;
  } catch (error) {
    if (error instanceof SerializationError) {
      log.debug('label_render_failed', { message: error.message, identifier: error.identifier });
    }
    throw error;
  }
}

/**
 * Renders `label` as ASCII bytes.
 *
 * @throws ConfigValidationError if the options are invalid.
 * @throws SerializationError if any sequence in the tree has no elements.
 */
export function render(label: Label, options: RenderCallOptions = {}): Uint8Array {
  return new TextEncoder().encode(renderToString(label, options));
}
