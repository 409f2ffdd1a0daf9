// symtrace Default-Factory Mapping
// `collections.defaultdict`: lazy value synthesis on a missing key

import type { Codegen } from "../codegen.ts";
import { TraceError, unimplemented } from "../errors.ts";
import { defaultDictClass } from "../host/object-model.ts";
import { addOptions, argAt, expectArgs, propagate } from "./base.ts";
import type { TraceContext } from "./context.ts";
import {
	callDictMethod,
	emitItems,
	getItemConst,
	insertItem,
	lookupItem,
	requireKey,
} from "./dicts.ts";
import { callFunction } from "./functions.ts";
import { describeKey } from "./keys.ts";
import type {
	DefaultDictVariable,
	DictEntry,
	DictItems,
	Kwargs,
	Variable,
	VariableOptions,
} from "./types.ts";
import { NO_KWARGS, makeCommon } from "./types.ts";

/** Factories assumed pure: they take no arguments and build an empty container. */
const CONSTANT_FACTORIES = ["list", "tuple", "dict"] as const;

export function isAllowlistedFactory(factory: Variable): boolean {
	if (factory.kind !== "builtin") return false;
	const fn = factory.fn;
	return CONSTANT_FACTORIES.some(name => name === fn);
}

/**
 * Factories the tracer can call symbolically.
 */
export function isSupportedFactory(factory: Variable): boolean {
	return isAllowlistedFactory(factory) || factory.kind === "userFunction";
}

export function createDefaultDict(
	factory: Variable | undefined,
	items: DictItems = new Map<string, DictEntry>(),
	options: VariableOptions = {},
): DefaultDictVariable {
	if (factory !== undefined && !isSupportedFactory(factory)) {
		return unimplemented("defaultdict with factory " + factory.kind);
	}
	const children = [...items.values()].map(e => e.value);
	if (factory !== undefined) children.push(factory);
	return {
		...makeCommon(options, children),
		kind: "defaultDict",
		items,
		userCls: defaultDictClass,
		defaultFactory: factory,
	};
}

/**
 * Only an absent or allow-listed factory lets the mapping fold to a
 * constant; an arbitrary factory may have effects.
 */
export function isDefaultDictConstant(v: DefaultDictVariable): boolean {
	return v.defaultFactory === undefined || isAllowlistedFactory(v.defaultFactory);
}

export function callDefaultDictMethod(
	tx: TraceContext,
	self: DefaultDictVariable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	if (name !== "__getitem__") return callDictMethod(tx, self, name, args, kwargs);

	expectArgs(name, args, kwargs, 1);
	const arg = argAt(args, 0, name);
	const key = requireKey(tx, arg, name);
	if (lookupItem(self.items, key) !== undefined) return getItemConst(tx, self, arg);

	const factory = self.defaultFactory;
	if (factory === undefined) throw TraceError.keyMissing(describeKey(key));

	const options = propagate(self, args);
	const produced = addOptions(callFunction(tx, factory, [], NO_KWARGS), options);
	insertItem(tx, self, key, produced, options);
	return produced;
}

export function reconstructDefaultDict(codegen: Codegen, v: DefaultDictVariable): void {
	codegen.loadModule("collections");
	codegen.loadAttr("defaultdict");
	if (v.defaultFactory === undefined) {
		codegen.loadConst(null);
	} else {
		codegen.reconstruct(v.defaultFactory);
	}
	emitItems(codegen, v.items);
	codegen.buildAggregate("map", v.items.size);
	codegen.callFunction(2);
}
