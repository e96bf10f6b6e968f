/**
 * Statement model: attributes, groups, objects and their containers.
 *
 * @packageDocumentation
 */

export {
  Attribute,
  GROUP_POLICY,
  Group,
  LABEL_POLICY,
  OBJECT_POLICY,
  ObjectStatement,
  Statements,
  cloneStatement,
  statementsEqual,
} from './statements.js';
export type {
  ContainerKind,
  ContainerPolicy,
  GroupStatements,
  Label,
  ObjectStatements,
  Statement,
  StatementKind,
  StatementValue,
} from './statements.js';
