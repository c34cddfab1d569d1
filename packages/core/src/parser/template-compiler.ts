/**
 * Template Compiler
 *
 * Turns a raw schema node into a TemplateNode tree. Every marker string is
 * parsed once and every array is classified once, by its head element:
 *
 *   ["{{repeat}}", count, template]              repeat (exactly 3 elements)
 *   ["{{cond}}", [[test, value], ...]]           cond   (exactly 2 elements)
 *   ["{{function|name}}", arg...]                call
 *   ["{{const|value|type}}", ...]                const  (tail ignored)
 *   anything else                                list
 *
 * Function names are resolved against the registry here, so an unknown
 * function fails before any output is produced.
 */

import { checkArity, type FunctionRegistry } from '../functions/registry.js';
import { MarkerSyntaxError, withPath } from '../types/errors.js';
import type {
  CondBranch,
  Directive,
  TemplateNode,
} from '../types/template.js';
import {
  isScalar,
  isValueList,
  type JsonValue,
  type ValueList,
  type ValueRecord,
} from '../types/value.js';
import {
  appendPointer,
  ROOT_POINTER,
  type JsonPointer,
} from '../util/json-pointer.js';
import { parseMarker } from './directive-parser.js';

export interface CompileOptions {
  functions: FunctionRegistry;
  /** Pointer of the schema root inside its document ('' when standalone). */
  basePointer?: JsonPointer;
}

/**
 * @throws MarkerSyntaxError, UnknownDirectiveKindError, TypeCoercionError,
 *   FunctionNotFoundError, ArgumentArityError; each located at the node
 */
export function compileTemplate(
  schema: JsonValue,
  options: CompileOptions
): TemplateNode {
  return new TemplateCompiler(options.functions).compile(
    schema,
    options.basePointer ?? ROOT_POINTER
  );
}

class TemplateCompiler {
  constructor(private readonly functions: FunctionRegistry) {}

  compile(node: JsonValue, ptr: JsonPointer): TemplateNode {
    if (typeof node === 'string') {
      return this.compileString(node, ptr);
    }
    if (isScalar(node)) {
      return { tag: 'literal', value: node, ptr };
    }
    if (isValueList(node)) {
      return this.compileArray(node, ptr);
    }
    return this.compileObject(node, ptr);
  }

  private compileString(text: string, ptr: JsonPointer): TemplateNode {
    const directive = withPath(ptr, () => parseMarker(text));
    if (!directive) {
      return { tag: 'literal', value: text, ptr };
    }
    switch (directive.kind) {
      case 'variable':
        return { tag: 'variable', name: directive.name, ptr };
      case 'const':
        return { tag: 'const', value: directive.value, ptr };
      case 'function':
        return this.compileCall(directive.name, [], ptr);
      case 'cond':
      case 'repeat':
        throw new MarkerSyntaxError({
          message: `"${directive.kind}" must be the first element of an array: ${text}`,
          marker: text,
          path: ptr,
        });
    }
  }

  private compileArray(items: ValueList, ptr: JsonPointer): TemplateNode {
    const [head, ...tail] = items;
    const directive = headDirective(head, ptr);
    if (!directive) {
      return this.compileList(items, ptr);
    }

    switch (directive.kind) {
      case 'repeat':
        return this.compileRepeat(directive, items, ptr);
      case 'cond':
        return this.compileCond(directive, items, ptr);
      case 'function':
        return this.compileCall(directive.name, tail, ptr);
      case 'const':
        return { tag: 'const', value: directive.value, ptr };
      case 'variable':
        return this.compileList(items, ptr);
    }
  }

  private compileList(items: ValueList, ptr: JsonPointer): TemplateNode {
    return {
      tag: 'list',
      items: items.map((item, i) => this.compile(item, appendPointer(ptr, i))),
      ptr,
    };
  }

  private compileRepeat(
    directive: Directive,
    items: ValueList,
    ptr: JsonPointer
  ): TemplateNode {
    const [, count, template] = items;
    if (items.length !== 3 || count === undefined || template === undefined) {
      throw new MarkerSyntaxError({
        message: `"${directive.raw}" takes exactly a count and a template, got ${items.length - 1} element(s)`,
        marker: directive.raw,
        path: ptr,
      });
    }
    return {
      tag: 'repeat',
      count: this.compile(count, appendPointer(ptr, 1)),
      template: this.compile(template, appendPointer(ptr, 2)),
      ptr,
    };
  }

  private compileCond(
    directive: Directive,
    items: ValueList,
    ptr: JsonPointer
  ): TemplateNode {
    const [, pairs] = items;
    if (items.length !== 2 || pairs === undefined || !isValueList(pairs)) {
      throw new MarkerSyntaxError({
        message: `"${directive.raw}" takes exactly one list of [test, value] pairs`,
        marker: directive.raw,
        path: ptr,
      });
    }
    const pairsPtr = appendPointer(ptr, 1);
    const branches = pairs.map((pair, i): CondBranch => {
      const pairPtr = appendPointer(pairsPtr, i);
      const [test, value] = isValueList(pair) ? pair : [];
      if (
        !isValueList(pair) ||
        pair.length !== 2 ||
        test === undefined ||
        value === undefined
      ) {
        throw new MarkerSyntaxError({
          message: `Each "${directive.raw}" branch must be a [test, value] pair`,
          marker: directive.raw,
          path: pairPtr,
        });
      }
      return {
        test: this.compile(test, appendPointer(pairPtr, 0)),
        value: this.compile(value, appendPointer(pairPtr, 1)),
      };
    });
    return { tag: 'cond', branches, ptr };
  }

  /** `args` are the raw operands; they sit at indexes 1.. of the array. */
  private compileCall(
    name: string,
    args: readonly JsonValue[],
    ptr: JsonPointer
  ): TemplateNode {
    const fn = withPath(ptr, () => this.functions.resolve(name));
    withPath(ptr, () => checkArity(fn, args.length));
    return {
      tag: 'call',
      fn,
      args: args.map((arg, i) => this.compile(arg, appendPointer(ptr, i + 1))),
      ptr,
    };
  }

  private compileObject(node: ValueRecord, ptr: JsonPointer): TemplateNode {
    return {
      tag: 'object',
      entries: Object.entries(node).map(
        ([key, value]) =>
          [key, this.compile(value, appendPointer(ptr, key))] as const
      ),
      ptr,
    };
  }
}

function headDirective(
  head: JsonValue | undefined,
  ptr: JsonPointer
): Directive | undefined {
  if (typeof head !== 'string') return undefined;
  return withPath(appendPointer(ptr, 0), () => parseMarker(head));
}
