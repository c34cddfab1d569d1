/**
 * Directives and the compiled template tree.
 *
 * A Directive is the parsed form of one marker string. A TemplateNode is a
 * schema node after compilation: each array has been classified once into
 * repeat / cond / call / const / list, so the evaluator never re-inspects
 * raw markers.
 */

import type { FunctionDefinition } from '../functions/registry.js';
import type { JsonPointer } from '../util/json-pointer.js';
import type { Scalar, Value } from './value.js';

export const DIRECTIVE_KINDS = [
  'variable',
  'function',
  'const',
  'cond',
  'repeat',
] as const;

export type DirectiveKind = (typeof DIRECTIVE_KINDS)[number];

export const CONST_TYPES = ['int', 'float', 'str', 'bool', 'list', 'dict'] as const;

export type ConstType = (typeof CONST_TYPES)[number];

interface DirectiveBase {
  /** The marker exactly as written in the template. */
  readonly raw: string;
}

export interface VariableDirective extends DirectiveBase {
  readonly kind: 'variable';
  readonly name: string;
}

export interface FunctionDirective extends DirectiveBase {
  readonly kind: 'function';
  readonly name: string;
}

export interface ConstDirective extends DirectiveBase {
  readonly kind: 'const';
  readonly value: Value;
  readonly type: ConstType;
}

export interface CondDirective extends DirectiveBase {
  readonly kind: 'cond';
}

export interface RepeatDirective extends DirectiveBase {
  readonly kind: 'repeat';
}

export type Directive =
  | VariableDirective
  | FunctionDirective
  | ConstDirective
  | CondDirective
  | RepeatDirective;

interface NodeBase {
  /** Location of the originating schema node in the input document. */
  readonly ptr: JsonPointer;
}

export interface LiteralNode extends NodeBase {
  readonly tag: 'literal';
  readonly value: Scalar;
}

export interface ConstNode extends NodeBase {
  readonly tag: 'const';
  readonly value: Value;
}

export interface VariableNode extends NodeBase {
  readonly tag: 'variable';
  readonly name: string;
}

export interface CallNode extends NodeBase {
  readonly tag: 'call';
  readonly fn: FunctionDefinition;
  readonly args: readonly TemplateNode[];
}

export interface RepeatNode extends NodeBase {
  readonly tag: 'repeat';
  readonly count: TemplateNode;
  readonly template: TemplateNode;
}

export interface CondBranch {
  readonly test: TemplateNode;
  readonly value: TemplateNode;
}

export interface CondNode extends NodeBase {
  readonly tag: 'cond';
  readonly branches: readonly CondBranch[];
}

export interface ListNode extends NodeBase {
  readonly tag: 'list';
  readonly items: readonly TemplateNode[];
}

export interface ObjectNode extends NodeBase {
  readonly tag: 'object';
  readonly entries: ReadonlyArray<readonly [string, TemplateNode]>;
}

export type TemplateNode =
  | LiteralNode
  | ConstNode
  | VariableNode
  | CallNode
  | RepeatNode
  | CondNode
  | ListNode
  | ObjectNode;

const directiveKinds: readonly string[] = DIRECTIVE_KINDS;
const constTypes: readonly string[] = CONST_TYPES;

export function isDirectiveKind(kind: string): kind is DirectiveKind {
  return directiveKinds.includes(kind);
}

export function isConstType(type: string): type is ConstType {
  return constTypes.includes(type);
}
