// symtrace Key Normalizer
// Canonicalizes symbolic values into dict keys, and back

import { createHash } from "node:crypto";

import type { HostNNModule, HostTensor, LiveValue } from "../host/values.ts";
import { isLiteral } from "../host/values.ts";
import { globalWeakRefSource } from "../source.ts";
import type { PropagatedOptions } from "./base.ts";
import { addOptions } from "./base.ts";
import type { TraceContext } from "./context.ts";
import type { DictKey, KeyTuple, Variable } from "./types.ts";
import { constantVar } from "./types.ts";

export type KeyResult =
	| { ok: true; key: DictKey }
	| { ok: false; reason: string };

/** Keys whose runtime identity, not just their value, must be preserved. */
export type GlobalRefKey = HostTensor | HostNNModule | KeyTuple;

type ModuleLookup = Pick<TraceContext, "lookupNNModule">;

//==============================================================================
// Normalization
//==============================================================================

/**
 * Turn a symbolic value into a dict key, or reject it explicitly.
 */
export function normalizeKey(tx: ModuleLookup, v: Variable): KeyResult {
	switch (v.kind) {
	case "constant":
		return { ok: true, key: v.value };
	case "tensor":
		if (v.specializedValue === undefined) {
			return { ok: false, reason: "tensor without a specialized identity" };
		}
		return { ok: true, key: v.specializedValue };
	case "nnModule": {
		const module = tx.lookupNNModule(v.moduleKey);
		if (module === undefined) {
			return { ok: false, reason: "unregistered module " + v.moduleKey };
		}
		return { ok: true, key: module };
	}
	case "tuple": {
		const items: DictKey[] = [];
		for (const item of v.items) {
			const result = normalizeKey(tx, item);
			if (!result.ok) return { ok: false, reason: "tuple element: " + result.reason };
			items.push(result.key);
		}
		return { ok: true, key: { kind: "tuple", items } };
	}
	default:
		return { ok: false, reason: v.kind + " is not a valid dict key" };
	}
}

export function isValidKey(tx: ModuleLookup, v: Variable): boolean {
	return normalizeKey(tx, v).ok;
}

/**
 * Convert a live host key, as found in a real mapping, to a normalized key.
 */
export function liveKeyToDictKey(value: LiveValue): DictKey | undefined {
	if (isLiteral(value)) return value;
	switch (value.kind) {
	case "tensor":
	case "nnModule":
		return value;
	case "tuple": {
		const items: DictKey[] = [];
		for (const item of value.items) {
			const key = liveKeyToDictKey(item);
			if (key === undefined) return undefined;
			items.push(key);
		}
		return { kind: "tuple", items };
	}
	default:
		return undefined;
	}
}

//==============================================================================
// Hashing and Naming
//==============================================================================

/**
 * Canonical string form used as the storage key. Numbers hash by value, so
 * `true` and `1` collide exactly as they do in the host.
 */
export function keyHash(key: DictKey): string {
	if (key === null) return "n:";
	if (typeof key === "boolean") return "i:" + (key ? "1" : "0");
	if (typeof key === "number") return (Number.isInteger(key) ? "i:" : "f:") + String(key);
	if (typeof key === "string") return "s:" + key;
	switch (key.kind) {
	case "tensor":
		return "tensor:" + String(key.id);
	case "nnModule":
		return "mod:" + String(key.id);
	case "tuple":
		return "t:" + JSON.stringify(key.items.map(keyHash));
	}
}

export function isGlobalRefKey(key: DictKey): key is GlobalRefKey {
	return key !== null && typeof key === "object";
}

/**
 * Deterministic name of the weak external reference for an identity key.
 */
export function globalKeyName(key: GlobalRefKey): string {
	if (key.kind === "tuple") {
		const digest = createHash("sha256").update(keyHash(key)).digest("hex");
		return "__dict_key_t" + digest.slice(0, 16);
	}
	return "__dict_key_" + String(key.id);
}

export function describeKey(key: DictKey): string {
	if (key === null) return "None";
	if (typeof key !== "object") return JSON.stringify(key);
	switch (key.kind) {
	case "tensor":
		return "Tensor#" + String(key.id);
	case "nnModule":
		return "Module(" + key.name + ")";
	case "tuple":
		return "(" + key.items.map(describeKey).join(", ") + (key.items.length === 1 ? ",)" : ")");
	}
}

//==============================================================================
// Inverse Direction
//==============================================================================

/**
 * Re-synthesize a variable for a stored key. Identity keys are wrapped from
 * their weak-ref global so that the same runtime object is recovered.
 */
export function keyToVar(tx: TraceContext, key: DictKey, options: PropagatedOptions): Variable {
	if (isGlobalRefKey(key)) {
		return addOptions(tx.wrap(key, globalWeakRefSource(globalKeyName(key))), options);
	}
	return constantVar(key, options);
}
