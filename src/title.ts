// src/title.ts
// Title templating: documentation text with {{param}} placeholders,
// resolved against the arguments of one call.

import { textOf } from './format';
import type { BindingMap, CallableDescriptor, ParamDescriptor } from './types';

/** Markers that end the title part of a documentation string. */
const ANNOTATION = /:param|@param|:return|@return/;

/** Leading underscore marks internal members; they are never traced. */
export const isInternalName = (name: string): boolean => name.startsWith('_');

/**
 * Title part of a documentation string: everything before the first
 * parameter/return annotation, each line trimmed, lines joined without a separator.
 * JSDoc decoration (`/**`, `*` and `*\/`) is dropped.
 */
export function extractTitle(doc: string): string {
    const head = doc.split(ANNOTATION)[0] ?? '';
    return head
        .split('\n')
        .map((line) => line.trim().replace(/^\/\*\*?/, '').replace(/\*\/$/, '').replace(/^\*+/, '').trim())
        .join('');
}

/**
 * Bind every declared parameter to the value it received on this call.
 *
 * Precedence per parameter:
 * 1. positional argument at its position (`undefined` counts as not supplied)
 * 2. keyword argument of that name (own property of the object argument at its position)
 * 3. declared default
 *
 * Parameters with none of the three are bound to `undefined`.
 */
export function bindArguments(params: readonly ParamDescriptor[], args: readonly unknown[]): BindingMap {
    const bindings: BindingMap = new Map();
    for (const p of params) {
        let value: unknown = undefined;
        if (p.kind === 'positional') {
            value = args[p.index];
        } else if (p.kind === 'keyword') {
            const bag = args[p.index];
            if (bag !== null && typeof bag === 'object' && Object.prototype.hasOwnProperty.call(bag, p.name)) {
                value = Reflect.get(bag, p.name);
            }
        } else {
            const rest = args.slice(p.index);
            value = rest.length > 0 ? rest : undefined;
        }
        if (value === undefined && p.hasDefault) value = p.defaultValue;
        bindings.set(p.name, value);
    }
    return bindings;
}

/**
 * Render the title for one call.
 * - no documentation → the callable's bare name
 * - `{{name}}` of a bound parameter → the value's text form ('' when absent)
 * - placeholders naming no parameter are left as written
 */
export function renderTitle(descriptor: Pick<CallableDescriptor, 'name' | 'doc'>, bindings: BindingMap): string {
    if (!descriptor.doc) return descriptor.name;
    let title = extractTitle(descriptor.doc);
    for (const [name, value] of bindings) {
        const placeholder = `{{${name}}}`;
        if (title.includes(placeholder)) title = title.split(placeholder).join(textOf(value));
    }
    return title;
}

/** Bindings rendered to text, as handed to a step reporter. */
export function renderParams(bindings: BindingMap): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [name, value] of bindings) out[name] = textOf(value);
    return out;
}
