// symtrace Record Variables
// Fixed-schema records: schema-bound construction, field access, keyword-call rebuild

import type { Codegen } from "../codegen.ts";
import { TraceError, unimplemented } from "../errors.ts";
import type { HostRuntime } from "../host/runtime.ts";
import {
	dataclassFields,
	getAttr,
	hasAttr,
	isSubclass,
	lookupMethod,
} from "../host/object-model.ts";
import type { FieldSpec, HostClass, HostObject } from "../host/values.ts";
import { skipCode, ensureRecordBasePatched } from "../skipfiles.ts";
import type { Source } from "../source.ts";
import { attrSource } from "../source.ts";
import { argAt, expectArgs, propagate } from "./base.ts";
import type { TraceContext } from "./context.ts";
import { callDictMethod, getItemConst, lookupItem, requireKey, setItem } from "./dicts.ts";
import { callMethod } from "./dispatch.ts";
import { describeKey, keyHash } from "./keys.ts";
import type {
	DataClassVariable,
	DictEntry,
	DictItems,
	Kwargs,
	MappingVariable,
	Variable,
	VariableOptions,
} from "./types.ts";
import { NO_KWARGS, constantVar, makeCommon, tupleVar } from "./types.ts";

//==============================================================================
// Classification
//==============================================================================

/**
 * Third-party record outputs: subclasses of the record-output base, when
 * that library is present in the runtime.
 */
export function isRecordOutputClass(host: HostRuntime, cls: HostClass): boolean {
	const base = host.recordOutputBase;
	return base !== undefined && isSubclass(cls, base);
}

/**
 * Record outputs drop `None` fields; plain records keep them.
 */
export function recordIncludesNone(host: HostRuntime, cls: HostClass): boolean {
	return !isRecordOutputClass(host, cls);
}

//==============================================================================
// Argument Binding
//==============================================================================

export interface BoundArguments {
	/** One variable per schema field, in schema order */
	values: Map<string, Variable>;
	/** Fields filled from their schema default */
	defaulted: Set<string>;
}

/**
 * Bind call arguments to the schema exactly as the generated constructor
 * would. Defaults become constants.
 */
export function bindArguments(
	cls: HostClass,
	fields: readonly FieldSpec[],
	args: readonly Variable[],
	kwargs: Kwargs,
): BoundArguments {
	if (args.length > fields.length) {
		throw TraceError.schemaMismatch(
			cls.name,
			[],
			"takes " + String(fields.length) + " arguments but " + String(args.length) + " were given",
		);
	}

	const given = new Map<string, Variable>();
	args.forEach((arg, i) => {
		const spec = fields[i];
		if (spec !== undefined) given.set(spec.name, arg);
	});

	const unexpected: string[] = [];
	const duplicated: string[] = [];
	for (const [name, value] of kwargs) {
		if (!fields.some(f => f.name === name)) {
			unexpected.push(name);
		} else if (given.has(name)) {
			duplicated.push(name);
		} else {
			given.set(name, value);
		}
	}
	if (unexpected.length > 0) {
		throw TraceError.schemaMismatch(cls.name, unexpected, "unexpected keyword arguments");
	}
	if (duplicated.length > 0) {
		throw TraceError.schemaMismatch(cls.name, duplicated, "multiple values for arguments");
	}

	const values = new Map<string, Variable>();
	const defaulted = new Set<string>();
	const missing: string[] = [];
	for (const spec of fields) {
		const value = given.get(spec.name);
		if (value !== undefined) {
			values.set(spec.name, value);
		} else if (spec.hasDefault) {
			values.set(spec.name, constantVar(spec.default));
			defaulted.add(spec.name);
		} else {
			missing.push(spec.name);
		}
	}
	if (missing.length > 0) {
		throw TraceError.schemaMismatch(cls.name, missing, "missing required arguments");
	}
	return { values, defaulted };
}

function isNoneVar(v: Variable): boolean {
	return v.kind === "constant" && v.value === null;
}

function requireFields(cls: HostClass): readonly FieldSpec[] {
	const fields = dataclassFields(cls);
	if (fields === undefined) return unimplemented(cls.name + " is not a record class");
	return fields;
}

//==============================================================================
// Construction
//==============================================================================

/**
 * Symbolically call a record constructor. Under the exclude policy a field
 * that ends up `None` is left out of `items`, whether it was passed or
 * defaulted.
 */
export function createDataClass(
	tx: TraceContext,
	cls: HostClass,
	args: readonly Variable[],
	kwargs: Kwargs,
	options: VariableOptions = {},
): DataClassVariable {
	ensureRecordBasePatched(tx.host);
	const init = lookupMethod(cls, "__init__");
	if (init !== undefined && !init.native) skipCode(init);

	const fields = requireFields(cls);
	const includeNone = recordIncludesNone(tx.host, cls);
	const { values, defaulted } = bindArguments(cls, fields, args, kwargs);

	let items: DictItems = new Map<string, DictEntry>();
	const defaultedFields = new Set<string>();
	for (const [name, value] of values) {
		if (!includeNone && isNoneVar(value)) continue;
		items = setItem(items, name, value);
		if (defaulted.has(name)) defaultedFields.add(name);
	}

	const first = [...items.values()][0];
	if (items.size === 1 && first !== undefined && first.value.kind !== "tensor") {
		unimplemented("record iterator constructor");
	}

	return {
		...makeCommon(options, [...values.values()]),
		kind: "dataClass",
		items,
		userCls: cls,
		includeNone,
		defaultedFields,
	};
}

/**
 * Wrap a live record. Each field present on the object is wrapped with an
 * attribute source; excluded `None` fields still contribute their guards.
 */
export function wrapDataClass(
	tx: TraceContext,
	obj: HostObject,
	source?: Source,
): DataClassVariable {
	const fields = requireFields(obj.cls);
	const includeNone = recordIncludesNone(tx.host, obj.cls);

	let items: DictItems = new Map<string, DictEntry>();
	const excluded: Variable[] = [];
	for (const spec of fields) {
		if (!hasAttr(obj, spec.name)) continue;
		const live = getAttr(obj, spec.name);
		if (live === undefined) continue;
		const v = tx.wrap(live, source === undefined ? undefined : attrSource(source, spec.name));
		if (live !== null || includeNone) {
			items = setItem(items, spec.name, v);
		} else {
			excluded.push(v);
		}
	}

	const values = [...items.values()].map(e => e.value);
	return {
		...makeCommon({ ...propagate(excluded), source }, values),
		kind: "dataClass",
		items,
		userCls: obj.cls,
		includeNone,
		defaultedFields: new Set(),
	};
}

//==============================================================================
// Method Dispatch
//==============================================================================

export function callDataClassMethod(
	tx: TraceContext,
	self: DataClassVariable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	switch (name) {
	case "__getitem__": {
		expectArgs(name, args, kwargs, 1);
		const index = argAt(args, 0, name);
		if (index.kind === "constant" && typeof index.value === "string") {
			return getItemConst(tx, self, index);
		}
		const tuple = callDataClassMethod(tx, self, "to_tuple", [], NO_KWARGS);
		return callMethod(tx, tuple, "__getitem__", args, kwargs);
	}
	case "to_tuple":
		expectArgs(name, args, kwargs, 0);
		return tupleVar(
			[...self.items.values()].map(e => e.value),
			propagate(self, args, kwargs.values()),
		);
	case "__setattr__":
		return callDictMethod(tx, self, "__setitem__", args, kwargs);
	case "pop": {
		// Keyword reconstruction cannot express a removed field
		expectArgs(name, args, kwargs, 1, 2);
		const key = requireKey(tx, argAt(args, 0, name), name);
		if (lookupItem(self.items, key) !== undefined) {
			return unimplemented("pop of field " + describeKey(key) + " from " + self.userCls.name);
		}
		return callDictMethod(tx, self, name, args, kwargs);
	}
	default:
		return callDictMethod(tx, self, name, args, kwargs);
	}
}

/**
 * Field read. Unbound fields fall back to their literal schema default
 * under the exclude policy.
 */
export function getDataClassAttr(
	tx: TraceContext,
	self: DataClassVariable,
	name: string,
): Variable {
	if (self.items.has(keyHash(name))) {
		return callDataClassMethod(tx, self, "__getitem__", [constantVar(name)], NO_KWARGS);
	}
	if (!self.includeNone) {
		const spec = requireFields(self.userCls).find(f => f.name === name);
		if (spec !== undefined && spec.hasDefault) {
			return constantVar(spec.default, propagate(self));
		}
	}
	return unimplemented("getattr " + self.userCls.name + "." + name);
}

//==============================================================================
// Reconstruction
//==============================================================================

/**
 * Constructor call binding every item by keyword, in item order. Shared by
 * every record-like mapping.
 */
export function emitKeywordConstruction(
	codegen: Codegen,
	v: MappingVariable,
	skip: ReadonlySet<string> = new Set(),
): void {
	codegen.loadConst(v.userCls);
	const names: string[] = [];
	for (const entry of v.items.values()) {
		const key = entry.key;
		if (typeof key !== "string") {
			unimplemented("keyword reconstruction of non-string key in " + v.userCls.name);
		}
		if (skip.has(key)) continue;
		codegen.reconstruct(entry.value);
		names.push(key);
	}
	codegen.callFunctionKw(names.length, names);
}

/** Defaulted fields are re-applied by the constructor and not emitted. */
export function reconstructDataClass(codegen: Codegen, v: DataClassVariable): void {
	emitKeywordConstruction(codegen, v, v.defaultedFields);
}
