// symtrace Call Path
// Symbolic calls of builtins, user functions and classes

import { exhaustive, unimplemented } from "../errors.ts";
import {
	defaultDictClass,
	dictClass,
	isDataclass,
	isSubclass,
	orderedDictClass,
} from "../host/object-model.ts";
import type { HostClass } from "../host/values.ts";
import { argAt, expectArgs, propagate } from "./base.ts";
import type { TraceContext } from "./context.ts";
import { createCustomizedDict, isMatchingCustomizedDictClass } from "./customized-dict.ts";
import { createDataClass } from "./dataclass.ts";
import { createDefaultDict } from "./default-dict.ts";
import { createDict, requireKey, setItem, storeKeyRef } from "./dicts.ts";
import { unpackVarSequence } from "./dispatch.ts";
import type {
	BuiltinVariable,
	DictEntry,
	DictItems,
	Kwargs,
	UserDefinedClassVariable,
	Variable,
} from "./types.ts";
import {
	constantVar,
	isMappingVariable,
	isSequenceVariable,
	listVar,
	newMutableLocal,
	setVar,
	tupleVar,
} from "./types.ts";

/**
 * Call a symbolic callable. Only builtins, user functions (inlined) and
 * classes are callable.
 */
export function callFunction(
	tx: TraceContext,
	fn: Variable,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	switch (fn.kind) {
	case "builtin":
		return callBuiltin(tx, fn, args, kwargs);
	case "userFunction":
		return tx.inlineUserFunctionReturn(fn, args, kwargs);
	case "userDefinedClass":
		return callClass(tx, fn, args, kwargs);
	default:
		return unimplemented("call of " + fn.kind);
	}
}

//==============================================================================
// Builtins
//==============================================================================

function callBuiltin(
	tx: TraceContext,
	fn: BuiltinVariable,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	const options = propagate(fn, args, kwargs.values());
	const elements = (): readonly Variable[] => {
		expectArgs(fn.fn, args, kwargs, 0, 1);
		const arg = args[0];
		return arg === undefined ? [] : unpackVarSequence(tx, arg);
	};

	switch (fn.fn) {
	case "list":
		return listVar(elements(), { ...options, mutableLocal: newMutableLocal() });
	case "tuple":
		return tupleVar(elements(), options);
	case "set":
		return setVar(elements(), { ...options, mutableLocal: newMutableLocal() });
	case "dict":
		return createDict(mappingArguments(tx, "dict", args, kwargs), dictClass, {
			...options,
			mutableLocal: newMutableLocal(),
		});
	case "len": {
		expectArgs("len", args, kwargs, 1);
		const arg = argAt(args, 0, "len");
		if (isMappingVariable(arg)) return constantVar(arg.items.size, options);
		if (isSequenceVariable(arg)) return constantVar(arg.items.length, options);
		return unimplemented("len of " + arg.kind);
	}
	case "isinstance": {
		expectArgs("isinstance", args, kwargs, 2);
		const cls = classOf(argAt(args, 0, "isinstance"));
		const target = argAt(args, 1, "isinstance");
		if (cls === undefined || target.kind !== "userDefinedClass") {
			return unimplemented("isinstance with " + target.kind);
		}
		return constantVar(isSubclass(cls, target.value), options);
	}
	default:
		return exhaustive(fn.fn);
	}
}

function classOf(v: Variable): HostClass | undefined {
	if (isMappingVariable(v)) return v.userCls;
	if (v.kind === "userDefinedObject" || v.kind === "configObject") return v.value.cls;
	return undefined;
}

/**
 * Items of a `dict(...)`-style call: an optional mapping or sequence of
 * pairs, then keyword entries.
 */
function mappingArguments(
	tx: TraceContext,
	method: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): DictItems {
	if (args.length > 1) return unimplemented(method + " with " + String(args.length) + " arguments");
	let items: DictItems = new Map<string, DictEntry>();
	const first = args[0];
	if (first !== undefined) {
		if (isMappingVariable(first)) {
			items = first.items;
		} else {
			for (const pair of unpackVarSequence(tx, first)) {
				if (pair.kind !== "tuple" || pair.items.length !== 2) {
					return unimplemented(method + " from a sequence of " + pair.kind);
				}
				const [k, v] = pair.items;
				if (k === undefined || v === undefined) return unimplemented(method + " from a malformed pair");
				const key = requireKey(tx, k, method);
				storeKeyRef(tx, key);
				items = setItem(items, key, v);
			}
		}
	}
	for (const [name, value] of kwargs) items = setItem(items, name, value);
	return items;
}

//==============================================================================
// Classes
//==============================================================================

/**
 * Instantiate a class symbolically. Mapping classes are checked before
 * records, since a customized mapping may also be a dataclass.
 */
export function callClass(
	tx: TraceContext,
	clsVar: UserDefinedClassVariable,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	const cls = clsVar.value;
	const options = propagate(clsVar, args, kwargs.values());

	if (cls === defaultDictClass) {
		if (args.length > 2) return unimplemented("defaultdict with " + String(args.length) + " arguments");
		const [factory, initial] = args;
		const factoryVar = factory === undefined || (factory.kind === "constant" && factory.value === null)
			? undefined
			: factory;
		return createDefaultDict(
			factoryVar,
			mappingArguments(tx, "defaultdict", initial === undefined ? [] : [initial], kwargs),
			{ ...options, mutableLocal: newMutableLocal() },
		);
	}
	if (cls === dictClass || cls === orderedDictClass) {
		return createDict(mappingArguments(tx, cls.name, args, kwargs), cls, {
			...options,
			mutableLocal: newMutableLocal(),
		});
	}
	if (isMatchingCustomizedDictClass(tx.host, tx.config, cls)) {
		return createCustomizedDict(tx, cls, args, kwargs, options);
	}
	if (isDataclass(cls)) {
		return createDataClass(tx, cls, args, kwargs, options);
	}
	return unimplemented("call of class " + cls.name);
}
