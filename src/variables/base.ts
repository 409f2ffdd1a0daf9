// symtrace Variable Helpers
// Guard propagation and identity substitution shared by every variable kind

import type { GuardSet } from "../guards.ts";
import { emptyGuards, unionGuards } from "../guards.ts";
import { unimplemented } from "../errors.ts";
import type { DictEntry, DictItems, Kwargs, MutableLocal, Variable } from "./types.ts";

export interface PropagatedOptions {
	guards: GuardSet;
}

/**
 * Union of the guards of every contributing variable.
 */
export function propagate(...sources: (Variable | Iterable<Variable>)[]): PropagatedOptions {
	const sets: GuardSet[] = [emptyGuards()];
	for (const source of sources) {
		if ("kind" in source) {
			sets.push(source.guards);
		} else {
			for (const v of source) sets.push(v.guards);
		}
	}
	return { guards: unionGuards(...sets) };
}

/**
 * Return `v` carrying the extra guards. The same instance comes back when
 * nothing is added.
 */
export function addOptions<V extends Variable>(v: V, options: PropagatedOptions): V {
	const guards = unionGuards(v.guards, options.guards);
	if (guards === v.guards) return v;
	return { ...v, guards };
}

//==============================================================================
// Substitution
//==============================================================================

function mapItems(items: DictItems, f: (v: Variable) => Variable): DictItems {
	const next = new Map<string, DictEntry>();
	for (const [hash, entry] of items) next.set(hash, { key: entry.key, value: f(entry.value) });
	return next;
}

/**
 * Rebuild a container with every direct child passed through `f`.
 */
export function mapChildren(v: Variable, f: (child: Variable) => Variable): Variable {
	switch (v.kind) {
	case "tuple":
	case "list":
	case "set":
		return { ...v, items: v.items.map(f) };
	case "dict":
	case "defaultDict":
	case "dataClass":
	case "customizedDict":
		return { ...v, items: mapItems(v.items, f) };
	default:
		return v;
	}
}

/**
 * Replace every reference to `oldVar` reachable from `v`. Containers are
 * only descended when their aggregate contents include `oldVar`'s token, and
 * take on the guards of `newVar`.
 */
export function substitute(v: Variable, oldVar: Variable, newVar: Variable): Variable {
	if (v === oldVar) return newVar;
	const token = oldVar.mutableLocal;
	if (token === undefined || !v.recursivelyContains.has(token)) return v;
	const rebuilt = mapChildren(v, child => substitute(child, oldVar, newVar));
	const contains = new Set<MutableLocal>(rebuilt.recursivelyContains);
	for (const inner of newVar.recursivelyContains) contains.add(inner);
	if (newVar.mutableLocal !== undefined) contains.add(newVar.mutableLocal);
	return {
		...rebuilt,
		guards: unionGuards(rebuilt.guards, newVar.guards),
		recursivelyContains: contains,
	};
}

//==============================================================================
// Argument Checks
//==============================================================================

/**
 * Require a positional-only call with between `min` and `max` arguments.
 */
export function expectArgs(
	method: string,
	args: readonly Variable[],
	kwargs: Kwargs,
	min: number,
	max = min,
): void {
	if (kwargs.size > 0) unimplemented(method + " with keyword arguments");
	if (args.length < min || args.length > max) {
		unimplemented(method + " with " + String(args.length) + " arguments");
	}
}

export function argAt(args: readonly Variable[], index: number, method: string): Variable {
	const arg = args[index];
	if (arg === undefined) return unimplemented(method + " missing argument " + String(index));
	return arg;
}
