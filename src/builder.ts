// symtrace Variable Builder
// Classifies live host values once and wraps them as guarded variables

import { exhaustive, unimplemented } from "./errors.ts";
import type { Guard } from "./guards.ts";
import { emptyGuards, guardSet, makeGuard } from "./guards.ts";
import { defaultDictClass, dictClass, isDataclass, moduleClass, orderedDictClass } from "./host/object-model.ts";
import type { HostRuntime } from "./host/runtime.ts";
import type { HostObject, LiveValue } from "./host/values.ts";
import { isLiteral } from "./host/values.ts";
import type { TraceConfig } from "./config.ts";
import type { Source } from "./source.ts";
import { attrSource, getItemSource } from "./source.ts";
import { isPretrainedConfigClass, configObjectVar } from "./variables/config-object.ts";
import type { TraceContext } from "./variables/context.ts";
import { isMatchingCustomizedDictClass } from "./variables/customized-dict.ts";
import { wrapDataClass } from "./variables/dataclass.ts";
import { createDefaultDict, isSupportedFactory } from "./variables/default-dict.ts";
import { createDict, setItem } from "./variables/dicts.ts";
import { describeKeys } from "./variables/dispatch.ts";
import { globalKeyName, isGlobalRefKey, liveKeyToDictKey } from "./variables/keys.ts";
import { createSysModules } from "./variables/sys-modules.ts";
import { addOptions } from "./variables/base.ts";
import type { DictEntry, DictItems, DictVariable, Variable, VariableOptions } from "./variables/types.ts";
import {
	builtinVar,
	constantVar,
	listVar,
	newMutableLocal,
	nnModuleVar,
	proxy,
	moduleVar,
	tensorVar,
	tupleVar,
	userDefinedClassVar,
	userDefinedObjectVar,
	userFunctionVar,
} from "./variables/types.ts";

//==============================================================================
// Classification
//==============================================================================

/** The closed set of shapes a live value can be wrapped as. */
export type LiveClassification =
	| "literal"
	| "tensor"
	| "nnModule"
	| "tuple"
	| "list"
	| "function"
	| "builtin"
	| "class"
	| "sysModules"
	| "dict"
	| "defaultDict"
	| "dataClass"
	| "configObject"
	| "module"
	| "userDefinedObject";

/**
 * Decide once, at wrap time, which variable kind stands for `value`. The
 * class-hierarchy oracles are consulted here and nowhere else.
 */
export function classifyLiveValue(
	host: HostRuntime,
	config: TraceConfig,
	value: LiveValue,
): LiveClassification {
	if (isLiteral(value)) return "literal";
	switch (value.kind) {
	case "tensor":
	case "nnModule":
	case "tuple":
	case "list":
	case "function":
	case "builtin":
	case "class":
		return value.kind;
	case "object":
		return classifyObject(host, config, value);
	default:
		return exhaustive(value);
	}
}

function classifyObject(host: HostRuntime, config: TraceConfig, obj: HostObject): LiveClassification {
	const cls = obj.cls;
	if (obj === host.modules) return "sysModules";
	if (cls === dictClass || cls === orderedDictClass) return "dict";
	if (cls === defaultDictClass) return "defaultDict";
	if (isPretrainedConfigClass(host, cls)) return "configObject";
	if (isMatchingCustomizedDictClass(host, config, cls)) return "userDefinedObject";
	if (isDataclass(cls)) return "dataClass";
	if (cls === moduleClass) return "module";
	return "userDefinedObject";
}

//==============================================================================
// Wrapping
//==============================================================================

function guardsFor(source: Source | undefined, make: (source: Source) => Guard): VariableOptions {
	if (source === undefined) return {};
	return { source, guards: guardSet([make(source)]) };
}

/**
 * Build the variable for a live value reached through `source`.
 */
export function wrapLiveValue(tx: TraceContext, value: LiveValue, source?: Source): Variable {
	const classification = classifyLiveValue(tx.host, tx.config, value);
	if (isLiteral(value)) {
		return constantVar(value, guardsFor(source, s => makeGuard("CONSTANT_MATCH", s, JSON.stringify(value))));
	}

	switch (value.kind) {
	case "tensor": {
		const detail = value.dtype + "[" + value.shape.join(", ") + "]";
		return tensorVar(
			proxy("tensor_" + String(value.id)),
			value,
			guardsFor(source, s => makeGuard("TENSOR_MATCH", s, detail)),
		);
	}
	case "nnModule":
		return nnModuleVar(tx.registerNNModule(value), guardsFor(source, s => makeGuard("ID_MATCH", s)));
	case "tuple":
	case "list": {
		const length = String(value.items.length);
		const items = value.items.map((item, i) =>
			tx.wrap(item, source === undefined ? undefined : getItemSource(source, i)),
		);
		const options = guardsFor(source, s => makeGuard("LIST_LENGTH", s, length));
		return value.kind === "tuple"
			? tupleVar(items, options)
			: listVar(items, { ...options, mutableLocal: newMutableLocal() });
	}
	case "function":
		return userFunctionVar(value, guardsFor(source, s => makeGuard("FUNCTION_MATCH", s)));
	case "builtin":
		return builtinVar(value.name, guardsFor(source, s => makeGuard("FUNCTION_MATCH", s)));
	case "class":
		return userDefinedClassVar(value, guardsFor(source, s => makeGuard("ID_MATCH", s)));
	case "object":
		return wrapObject(tx, value, classification, source);
	default:
		return exhaustive(value);
	}
}

function wrapObject(
	tx: TraceContext,
	obj: HostObject,
	classification: LiveClassification,
	source: Source | undefined,
): Variable {
	const className = obj.cls.name;
	const typeMatch = guardsFor(source, s => makeGuard("TYPE_MATCH", s, className));
	switch (classification) {
	case "sysModules":
		return createSysModules(guardsFor(source, s => makeGuard("FUNCTION_MATCH", s)));
	case "dict":
		return wrapDictSnapshot(tx, obj, source);
	case "defaultDict": {
		const factory = obj.attrs.get("default_factory") ?? null;
		const factoryVar = factory === null
			? undefined
			: tx.wrap(factory, source === undefined ? undefined : attrSource(source, "default_factory"));
		if (factoryVar !== undefined && !isSupportedFactory(factoryVar)) {
			return userDefinedObjectVar(obj, typeMatch);
		}
		const snapshot = wrapDictSnapshot(tx, obj, source);
		return createDefaultDict(factoryVar, snapshot.items, {
			guards: snapshot.guards,
			source,
			mutableLocal: snapshot.mutableLocal,
		});
	}
	case "dataClass":
		return addOptions(wrapDataClass(tx, obj, source), { guards: typeMatch.guards ?? emptyGuards() });
	case "configObject":
		return configObjectVar(obj, typeMatch);
	case "module":
		return moduleVar(obj, guardsFor(source, s => makeGuard("ID_MATCH", s)));
	case "userDefinedObject":
		return userDefinedObjectVar(obj, typeMatch);
	default:
		return unimplemented("wrap object classified as " + classification);
	}
}

/**
 * Wrap the entries of a live mapping as a mutable dict variable guarded on
 * its exact key sequence. Identity keys get a weak-ref slot and values are
 * sourced through it.
 */
export function wrapDictSnapshot(tx: TraceContext, obj: HostObject, source?: Source): DictVariable {
	let items: DictItems = new Map<string, DictEntry>();
	for (const [liveKey, liveValue] of obj.entries ?? []) {
		const key = liveKeyToDictKey(liveKey);
		if (key === undefined) return unimplemented("dict with an unsupported key in " + obj.cls.name);
		let valueSource: Source | undefined;
		if (isGlobalRefKey(key)) {
			const name = globalKeyName(key);
			tx.storeGlobalWeakref(name, key);
			valueSource = source === undefined ? undefined : getItemSource(source, name, true);
		} else {
			valueSource = source === undefined ? undefined : getItemSource(source, key);
		}
		items = setItem(items, key, tx.wrap(liveValue, valueSource));
	}
	const userCls = obj.cls === orderedDictClass ? orderedDictClass : dictClass;
	const shell = createDict(items, userCls);
	const options: VariableOptions = {
		...guardsFor(source, s => makeGuard("DICT_KEYS", s, describeKeys(shell))),
		mutableLocal: newMutableLocal(),
	};
	return createDict(items, userCls, options);
}
