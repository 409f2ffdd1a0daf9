// symtrace Guard Ledger
// Accumulate-only sets of validity predicates. Guards are collected here
// and evaluated later by the guard runtime; nothing in this package runs them.

import type { Source } from "./source.ts";
import { sourceName } from "./source.ts";

//==============================================================================
// Guard Domain
//==============================================================================

export type GuardKind =
	| "TYPE_MATCH"
	| "ID_MATCH"
	| "FUNCTION_MATCH"
	| "CONSTANT_MATCH"
	| "DICT_KEYS"
	| "DICT_CONTAINS"
	| "TENSOR_MATCH"
	| "LIST_LENGTH";

export type Guard = SourceGuard | MembershipGuard;

export interface SourceGuard {
	kind: Exclude<GuardKind, "DICT_CONTAINS">;
	/** Unique within a guard set */
	name: string;
	source: Source;
	detail: string;
}

/**
 * Asserts that `key` is (or is not) present in the table reached by `source`.
 */
export interface MembershipGuard {
	kind: "DICT_CONTAINS";
	name: string;
	source: Source;
	key: string;
	expectedPresent: boolean;
}

export type GuardSet = ReadonlyMap<string, Guard>;

//==============================================================================
// Constructors
//==============================================================================

export function makeGuard(
	kind: Exclude<GuardKind, "DICT_CONTAINS">,
	source: Source,
	detail = "",
): SourceGuard {
	const suffix = detail === "" ? "" : ", " + detail;
	return {
		kind,
		name: kind + "(" + sourceName(source) + suffix + ")",
		source,
		detail,
	};
}

export function membershipGuard(
	source: Source,
	key: string,
	expectedPresent: boolean,
): MembershipGuard {
	return {
		kind: "DICT_CONTAINS",
		name:
			"DICT_CONTAINS(" +
			sourceName(source) +
			", " +
			key +
			(expectedPresent ? "" : ", invert") +
			")",
		source,
		key,
		expectedPresent,
	};
}

//==============================================================================
// Set Operations
//==============================================================================

const EMPTY: GuardSet = new Map();

export function emptyGuards(): GuardSet {
	return EMPTY;
}

export function guardSet(guards: Iterable<Guard>): GuardSet {
	const set = new Map<string, Guard>();
	for (const guard of guards) set.set(guard.name, guard);
	return set;
}

/**
 * Merge guard sets. Never drops a guard; returns the first set itself
 * when the others add nothing.
 */
export function unionGuards(...sets: GuardSet[]): GuardSet {
	const [first, ...rest] = sets;
	if (first === undefined) return EMPTY;
	let merged: Map<string, Guard> | undefined;
	for (const set of rest) {
		for (const [name, guard] of set) {
			if ((merged ?? first).has(name)) continue;
			merged ??= new Map(first);
			merged.set(name, guard);
		}
	}
	return merged ?? first;
}

export function addGuards(set: GuardSet, guards: Iterable<Guard>): GuardSet {
	return unionGuards(set, guardSet(guards));
}

export function isSuperset(set: GuardSet, of: GuardSet): boolean {
	for (const name of of.keys()) {
		if (!set.has(name)) return false;
	}
	return true;
}
