// symtrace Customized Record Mappings
// Ordered-mapping subclasses whose overrides are inlined during tracing

import type { Codegen } from "../codegen.ts";
import type { TraceConfig } from "../config.ts";
import { unimplemented } from "../errors.ts";
import type { HostRuntime } from "../host/runtime.ts";
import {
	classHasAttr,
	dataclassFields,
	dictClass,
	isDataclass,
	isSubclass,
	lookupAttr,
	lookupMethod,
	orderedDictClass,
} from "../host/object-model.ts";
import type { HostClass } from "../host/values.ts";
import { skipCode } from "../skipfiles.ts";
import { attrSource } from "../source.ts";
import { propagate } from "./base.ts";
import type { TraceContext } from "./context.ts";
import { bindArguments, emitKeywordConstruction } from "./dataclass.ts";
import { callDictMethod, dictItems } from "./dicts.ts";
import { keyHash } from "./keys.ts";
import type {
	CustomizedDictVariable,
	DictEntry,
	DictItems,
	Kwargs,
	Variable,
	VariableOptions,
} from "./types.ts";
import {
	NO_KWARGS,
	constantVar,
	isMappingVariable,
	makeCommon,
	userFunctionVar,
} from "./types.ts";

const NATIVE_OWNERS: readonly HostClass[] = [dictClass, orderedDictClass];

// Hooks that must not be traced when the record is built or returned
const CONSTRUCTION_HOOKS = ["__init__", "__post_init__", "__setattr__", "__setitem__"];

//==============================================================================
// Classification
//==============================================================================

/**
 * Ordered-mapping subclasses keeping the native constructor and defining no
 * post-init hook, plus record outputs declared in the configured module.
 */
export function isMatchingCustomizedDictClass(
	host: HostRuntime,
	config: TraceConfig,
	cls: HostClass,
): boolean {
	if (
		cls !== orderedDictClass &&
		isSubclass(cls, orderedDictClass) &&
		lookupAttr(cls, "__init__") === lookupAttr(orderedDictClass, "__init__") &&
		!classHasAttr(cls, "__post_init__")
	) {
		return true;
	}
	if (cls.module !== config.recordOutputModule) return false;
	const base = host.recordOutputBase;
	return base !== undefined && isSubclass(cls, base);
}

//==============================================================================
// Construction
//==============================================================================

/**
 * Accepts an empty call, a record-style call bound against the schema, or
 * a single mapping argument.
 */
export function createCustomizedDict(
	tx: TraceContext,
	cls: HostClass,
	args: readonly Variable[],
	kwargs: Kwargs,
	options: VariableOptions = {},
): CustomizedDictVariable {
	for (const hook of CONSTRUCTION_HOOKS) {
		const fn = lookupMethod(cls, hook);
		if (fn !== undefined && !fn.native) skipCode(fn);
	}

	let items: DictItems;
	const first = args[0];
	if (args.length === 0 && kwargs.size === 0) {
		items = new Map<string, DictEntry>();
	} else if (isDataclass(cls)) {
		const { values } = bindArguments(cls, dataclassFields(cls) ?? [], args, kwargs);
		items = dictItems(values);
	} else if (args.length === 1 && first !== undefined && isMappingVariable(first) && kwargs.size === 0) {
		items = first.items;
	} else {
		return unimplemented("customized dict init with args/kwargs");
	}

	return {
		...makeCommon(options, [...items.values()].map(e => e.value)),
		kind: "customizedDict",
		items,
		userCls: cls,
	};
}

//==============================================================================
// Method Dispatch
//==============================================================================

/**
 * Unmodified native mapping methods dispatch to the base mapping; allow-listed
 * overrides are inlined with `self` prepended.
 */
export function callCustomizedDictMethod(
	tx: TraceContext,
	self: CustomizedDictVariable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	const fn = lookupMethod(self.userCls, name);
	if (fn === undefined) return unimplemented("custom dict: no method " + name);

	if (fn.native && fn.owner !== undefined && NATIVE_OWNERS.includes(fn.owner)) {
		return callDictMethod(tx, self, name, args, kwargs);
	}
	if (tx.config.customDictOverrideHooks.some(hook => hook === name)) {
		const options = propagate(self, args, kwargs.values());
		const source = self.source === undefined ? undefined : attrSource(self.source, name);
		return tx.inlineUserFunctionReturn(
			userFunctionVar(fn, { ...options, source }),
			[self, ...args],
			kwargs,
		);
	}
	return unimplemented("custom dict: call_method unimplemented name=" + name);
}

export function getCustomizedDictAttr(
	tx: TraceContext,
	self: CustomizedDictVariable,
	name: string,
): Variable {
	if (self.items.has(keyHash(name))) {
		return callCustomizedDictMethod(tx, self, "__getitem__", [constantVar(name)], NO_KWARGS);
	}
	return unimplemented("getattr " + self.userCls.name + "." + name);
}

export function reconstructCustomizedDict(codegen: Codegen, v: CustomizedDictVariable): void {
	emitKeywordConstruction(codegen, v);
}
