// symtrace Mapping Variables
// Copy-on-write symbolic dicts: method dispatch and reconstruction

import type { Codegen } from "../codegen.ts";
import { TraceError, exhaustive, unimplemented } from "../errors.ts";
import { dictClass, orderedDictClass } from "../host/object-model.ts";
import type { HostClass } from "../host/values.ts";
import type { PropagatedOptions } from "./base.ts";
import { addOptions, argAt, expectArgs, propagate } from "./base.ts";
import type { TraceContext } from "./context.ts";
import {
	describeKey,
	globalKeyName,
	isGlobalRefKey,
	keyHash,
	keyToVar,
	normalizeKey,
} from "./keys.ts";
import type {
	DictEntry,
	DictItems,
	DictKey,
	DictVariable,
	Kwargs,
	MappingVariable,
	MutableLocal,
	Variable,
	VariableOptions,
} from "./types.ts";
import {
	collectContains,
	constantVar,
	isMappingVariable,
	makeCommon,
	newMutableLocal,
	setVar,
	tupleVar,
} from "./types.ts";

//==============================================================================
// Method Enum
//==============================================================================

export const DICT_METHODS = [
	"__getitem__",
	"items",
	"keys",
	"values",
	"__len__",
	"__contains__",
	"get",
	"pop",
	"__setitem__",
	"update",
] as const;

export type DictMethod = (typeof DICT_METHODS)[number];

export function parseDictMethod(name: string): DictMethod | undefined {
	return DICT_METHODS.find(m => m === name);
}

//==============================================================================
// Items
//==============================================================================

/**
 * Build insertion-ordered items. A repeated key keeps its first position and
 * its first key object, taking the last value.
 */
export function dictItems(entries: Iterable<readonly [DictKey, Variable]>): DictItems {
	let items: DictItems = new Map<string, DictEntry>();
	for (const [key, value] of entries) items = setItem(items, key, value);
	return items;
}

export function setItem(items: DictItems, key: DictKey, value: Variable): DictItems {
	const next = new Map(items);
	const hash = keyHash(key);
	const previous = next.get(hash);
	next.set(hash, { key: previous === undefined ? key : previous.key, value });
	return next;
}

export function deleteItem(items: DictItems, key: DictKey): DictItems {
	const next = new Map(items);
	next.delete(keyHash(key));
	return next;
}

export function lookupItem(items: DictItems, key: DictKey): Variable | undefined {
	return items.get(keyHash(key))?.value;
}

//==============================================================================
// Construction
//==============================================================================

export function createDict(
	items: DictItems,
	userCls: HostClass = dictClass,
	options: VariableOptions = {},
): DictVariable {
	const values = [...items.values()].map(e => e.value);
	return {
		...makeCommon(options, values),
		kind: "dict",
		items,
		userCls,
	};
}

/**
 * A copy of `v` with different items. Guards of the new values are folded in.
 */
export function modified<V extends MappingVariable>(
	v: V,
	items: DictItems,
	recursivelyContains: ReadonlySet<MutableLocal>,
	options: PropagatedOptions,
	mutableLocal: MutableLocal | undefined = v.mutableLocal,
): V {
	const common = makeCommon(
		{ guards: options.guards, recursivelyContains },
		[...items.values()].map(e => e.value),
	);
	return {
		...v,
		items,
		guards: common.guards,
		recursivelyContains: common.recursivelyContains,
		mutableLocal,
	};
}

/**
 * Aggregate contents after inserting `value`: its own contents plus its
 * token when it is itself mutable.
 */
function containsWith(base: ReadonlySet<MutableLocal>, value: Variable): Set<MutableLocal> {
	const contains = new Set(base);
	for (const token of collectContains([value])) contains.add(token);
	return contains;
}

//==============================================================================
// Key Access
//==============================================================================

/**
 * Normalize a key argument. Operations without behaviour for rejected keys
 * escalate the rejection to Unsupported.
 */
export function requireKey(tx: TraceContext, arg: Variable, method: string): DictKey {
	const result = normalizeKey(tx, arg);
	if (!result.ok) {
		throw TraceError.unsupported(method + ": " + TraceError.keyRejected(result.reason).message);
	}
	return result.key;
}

export function getItemConst(
	tx: TraceContext,
	self: MappingVariable,
	arg: Variable,
): Variable {
	const key = requireKey(tx, arg, "__getitem__");
	const value = lookupItem(self.items, key);
	if (value === undefined) throw TraceError.keyMissing(describeKey(key));
	return addOptions(value, propagate(self, arg));
}

export function storeKeyRef(tx: TraceContext, key: DictKey): void {
	if (isGlobalRefKey(key)) tx.storeGlobalWeakref(globalKeyName(key), key);
}

/**
 * Insert through the copy-on-write path and publish the new variable.
 */
export function insertItem<V extends MappingVariable>(
	tx: TraceContext,
	self: V,
	key: DictKey,
	value: Variable,
	options: PropagatedOptions,
): V {
	storeKeyRef(tx, key);
	const result = modified(
		self,
		setItem(self.items, key, value),
		containsWith(self.recursivelyContains, value),
		options,
		self.mutableLocal ?? newMutableLocal(),
	);
	const published = markExplicit(result, [key]);
	tx.replaceAll(self, published);
	return published;
}

/**
 * Assigned record fields are no longer defaulted, so reconstruction emits
 * them.
 */
function markExplicit<V extends MappingVariable>(v: V, keys: Iterable<DictKey>): V {
	const mapping: MappingVariable = v;
	if (mapping.kind !== "dataClass") return v;
	const defaulted = new Set(mapping.defaultedFields);
	for (const key of keys) {
		if (typeof key === "string") defaulted.delete(key);
	}
	if (defaulted.size === mapping.defaultedFields.size) return v;
	return { ...v, defaultedFields: defaulted };
}

//==============================================================================
// Method Dispatch
//==============================================================================

/**
 * Symbolically execute a host mapping method. Mutating methods return the
 * replacement variable; the receiver is never changed.
 */
export function callDictMethod(
	tx: TraceContext,
	self: MappingVariable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	const method = parseDictMethod(name);
	if (method === undefined) return unimplemented(self.userCls.name + "." + name);
	const options = propagate(self, args, kwargs.values());

	switch (method) {
	case "__getitem__":
		expectArgs(name, args, kwargs, 1);
		return getItemConst(tx, self, argAt(args, 0, name));
	case "items":
		expectArgs(name, args, kwargs, 0);
		return tupleVar(
			[...self.items.values()].map(entry =>
				tupleVar([keyToVar(tx, entry.key, options), entry.value], options),
			),
			options,
		);
	case "keys":
		expectArgs(name, args, kwargs, 0);
		return setVar(
			[...self.items.values()].map(entry => keyToVar(tx, entry.key, options)),
			{ ...options, mutableLocal: newMutableLocal() },
		);
	case "values":
		expectArgs(name, args, kwargs, 0);
		return tupleVar([...self.items.values()].map(entry => entry.value), options);
	case "__len__":
		expectArgs(name, args, kwargs, 0);
		return constantVar(self.items.size, options);
	case "__contains__":
		expectArgs(name, args, kwargs, 1);
		return callContains(tx, self, argAt(args, 0, name), options);
	case "get":
		expectArgs(name, args, kwargs, 1, 2);
		return callGet(tx, self, args, options);
	case "pop":
		expectArgs(name, args, kwargs, 1, 2);
		return callPop(tx, self, args, options);
	case "__setitem__":
		expectArgs(name, args, kwargs, 2);
		return insertItem(
			tx,
			self,
			requireKey(tx, argAt(args, 0, name), name),
			argAt(args, 1, name),
			options,
		);
	case "update":
		expectArgs(name, args, kwargs, 1);
		return callUpdate(tx, self, argAt(args, 0, name), options);
	default:
		return exhaustive(method);
	}
}

function callContains(
	tx: TraceContext,
	self: MappingVariable,
	arg: Variable,
	options: PropagatedOptions,
): Variable {
	const result = normalizeKey(tx, arg);
	if (!result.ok) {
		const content = arg.kind === "tuple" ? "tuple of " + String(arg.items.length) : arg.kind;
		return unimplemented("NYI - __contains__ with " + content);
	}
	return constantVar(self.items.has(keyHash(result.key)), options);
}

function callGet(
	tx: TraceContext,
	self: MappingVariable,
	args: readonly Variable[],
	options: PropagatedOptions,
): Variable {
	const key = requireKey(tx, argAt(args, 0, "get"), "get");
	const value = lookupItem(self.items, key);
	if (value !== undefined) return addOptions(value, options);
	const fallback = args[1];
	if (fallback === undefined) {
		return unimplemented("get of missing key " + describeKey(key) + " without a default");
	}
	return addOptions(fallback, options);
}

function callPop(
	tx: TraceContext,
	self: MappingVariable,
	args: readonly Variable[],
	options: PropagatedOptions,
): Variable {
	if (self.mutableLocal === undefined) return unimplemented("pop on an immutable mapping");
	const key = requireKey(tx, argAt(args, 0, "pop"), "pop");
	const value = lookupItem(self.items, key);
	if (value === undefined) {
		const fallback = args[1];
		if (fallback === undefined) throw TraceError.keyMissing(describeKey(key));
		return addOptions(fallback, options);
	}
	tx.replaceAll(
		self,
		modified(self, deleteItem(self.items, key), self.recursivelyContains, options),
	);
	return addOptions(value, options);
}

function callUpdate(
	tx: TraceContext,
	self: MappingVariable,
	other: Variable,
	options: PropagatedOptions,
): Variable {
	if (!isMappingVariable(other)) return unimplemented("update with " + other.kind);
	if (self.mutableLocal === undefined) return unimplemented("update on an immutable mapping");
	let items = self.items;
	for (const entry of other.items.values()) items = setItem(items, entry.key, entry.value);
	const contains = new Set(self.recursivelyContains);
	for (const token of other.recursivelyContains) contains.add(token);
	const result = markExplicit(
		modified(self, items, contains, options),
		[...other.items.values()].map(e => e.key),
	);
	return tx.replaceAll(self, result);
}

//==============================================================================
// Reconstruction
//==============================================================================

/**
 * Emit keys and values in insertion order. Identity keys are loaded from
 * their weak-ref global and called to recover the referent.
 */
export function emitItems(codegen: Codegen, items: DictItems): void {
	for (const entry of items.values()) {
		if (isGlobalRefKey(entry.key)) {
			codegen.loadGlobal(globalKeyName(entry.key), true);
			codegen.callFunction(0);
		} else {
			codegen.loadConst(entry.key);
		}
		codegen.reconstruct(entry.value);
	}
}

export function reconstructDict(codegen: Codegen, v: DictVariable): void {
	const ordered = v.userCls === orderedDictClass;
	if (ordered) {
		codegen.loadModule("collections");
		codegen.loadAttr("OrderedDict");
	}
	emitItems(codegen, v.items);
	codegen.buildAggregate("map", v.items.size);
	if (ordered) codegen.callFunction(1);
}
