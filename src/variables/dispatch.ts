// symtrace Variable Dispatch
// Entry points the tracer calls on any variable: methods, attributes, projections

import { exhaustive, unimplemented } from "../errors.ts";
import { getAttr as getLiveAttr, hasAttr as hasLiveAttr, lookupAttr } from "../host/object-model.ts";
import type { Literal } from "../host/values.ts";
import { attrSource } from "../source.ts";
import { addOptions, argAt, expectArgs, propagate } from "./base.ts";
import { getConfigAttr, hasConfigAttr } from "./config-object.ts";
import type { TraceContext } from "./context.ts";
import { callCustomizedDictMethod, getCustomizedDictAttr } from "./customized-dict.ts";
import { callDataClassMethod, getDataClassAttr } from "./dataclass.ts";
import { callDefaultDictMethod, isDefaultDictConstant } from "./default-dict.ts";
import { callDictMethod } from "./dicts.ts";
import { describeKey, keyToVar } from "./keys.ts";
import { callSysModulesMethod } from "./sys-modules.ts";
import type {
	DictKey,
	GraphProxy,
	Kwargs,
	MappingVariable,
	SequenceVariable,
	Variable,
} from "./types.ts";
import { NO_KWARGS, constantVar, isMappingVariable } from "./types.ts";

//==============================================================================
// Method Calls
//==============================================================================

/**
 * Symbolically call `self.name(*args, **kwargs)`. Throws `TraceError` when
 * the call cannot be captured.
 */
export function callMethod(
	tx: TraceContext,
	self: Variable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs = NO_KWARGS,
): Variable {
	if (tx.config.trace) {
		console.log("[Tracer] " + self.kind + "." + name + "/" + String(args.length));
	}

	switch (self.kind) {
	case "dict":
		return callDictMethod(tx, self, name, args, kwargs);
	case "defaultDict":
		return callDefaultDictMethod(tx, self, name, args, kwargs);
	case "dataClass":
		return callDataClassMethod(tx, self, name, args, kwargs);
	case "customizedDict":
		return callCustomizedDictMethod(tx, self, name, args, kwargs);
	case "sysModules":
		return callSysModulesMethod(tx, self, name, args, kwargs);
	case "tuple":
	case "list":
	case "set":
		return callSequenceMethod(self, name, args, kwargs);
	case "constant":
	case "tensor":
	case "nnModule":
	case "userFunction":
	case "builtin":
	case "module":
	case "userDefinedObject":
	case "userDefinedClass":
	case "configObject":
		return unimplemented(self.kind + "." + name);
	default:
		return exhaustive(self);
	}
}

function callSequenceMethod(
	self: SequenceVariable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	const options = propagate(self, args, kwargs.values());
	switch (name) {
	case "__len__":
		expectArgs(name, args, kwargs, 0);
		return constantVar(self.items.length, options);
	case "__getitem__": {
		expectArgs(name, args, kwargs, 1);
		if (self.kind === "set") return unimplemented("set is not subscriptable");
		const index = argAt(args, 0, name);
		if (index.kind !== "constant" || typeof index.value !== "number" || !Number.isInteger(index.value)) {
			return unimplemented(self.kind + " index of " + index.kind);
		}
		const position = index.value < 0 ? self.items.length + index.value : index.value;
		const item = self.items[position];
		if (item === undefined) return unimplemented(self.kind + " index out of range");
		return addOptions(item, options);
	}
	default:
		return unimplemented(self.kind + "." + name);
	}
}

//==============================================================================
// Attributes
//==============================================================================

export function getAttr(tx: TraceContext, self: Variable, name: string): Variable {
	switch (self.kind) {
	case "dataClass":
		return getDataClassAttr(tx, self, name);
	case "customizedDict":
		return getCustomizedDictAttr(tx, self, name);
	case "configObject":
		return getConfigAttr(self, name);
	case "module":
	case "userDefinedObject": {
		const live = getLiveAttr(self.value, name);
		if (live === undefined) return unimplemented(self.kind + " has no attribute " + name);
		const source = self.source === undefined ? undefined : attrSource(self.source, name);
		return addOptions(tx.wrap(live, source), propagate(self));
	}
	case "userDefinedClass": {
		const live = lookupAttr(self.value, name);
		if (live === undefined) return unimplemented(self.value.name + " has no attribute " + name);
		const source = self.source === undefined ? undefined : attrSource(self.source, name);
		return addOptions(tx.wrap(live, source), propagate(self));
	}
	default:
		return unimplemented("getattr " + self.kind + "." + name);
	}
}

export function hasAttr(self: Variable, name: string): Variable {
	switch (self.kind) {
	case "configObject":
		return hasConfigAttr(self, name);
	case "module":
	case "userDefinedObject":
		return constantVar(hasLiveAttr(self.value, name), propagate(self));
	default:
		return unimplemented("hasattr " + self.kind);
	}
}

//==============================================================================
// Projections
//==============================================================================

export type ConstantValue = Literal | readonly ConstantValue[] | ReadonlyMap<DictKey, ConstantValue>;

export type ProxyValue =
	| GraphProxy
	| Literal
	| readonly ProxyValue[]
	| ReadonlyMap<DictKey, ProxyValue>;

/**
 * Whether `asConstant` would succeed.
 */
export function isLiteralConstant(v: Variable): boolean {
	switch (v.kind) {
	case "constant":
		return true;
	case "tuple":
	case "list":
	case "set":
		return v.items.every(isLiteralConstant);
	case "defaultDict":
		return isDefaultDictConstant(v) && allValuesConstant(v);
	case "dict":
	case "dataClass":
	case "customizedDict":
		return allValuesConstant(v);
	default:
		return false;
	}
}

function allValuesConstant(v: MappingVariable): boolean {
	for (const entry of v.items.values()) {
		if (!isLiteralConstant(entry.value)) return false;
	}
	return true;
}

/**
 * Fold to a host constant. Requires every child to fold.
 */
export function asConstant(v: Variable): ConstantValue {
	switch (v.kind) {
	case "constant":
		return v.value;
	case "tuple":
	case "list":
	case "set":
		return v.items.map(asConstant);
	case "defaultDict":
		if (!isDefaultDictConstant(v)) return unimplemented("defaultdict with an arbitrary factory");
		return mapValues(v, asConstant);
	case "dict":
	case "dataClass":
	case "customizedDict":
		return mapValues(v, asConstant);
	default:
		return unimplemented(v.kind + " is not a constant");
	}
}

/**
 * Graph-level view. Records never enter the computation graph.
 */
export function asProxy(v: Variable): ProxyValue {
	switch (v.kind) {
	case "tensor":
		return v.proxy;
	case "constant":
		return v.value;
	case "tuple":
	case "list":
		return v.items.map(asProxy);
	case "dict":
	case "defaultDict":
		return mapValues(v, asProxy);
	case "dataClass":
	case "customizedDict":
		return unimplemented("as_proxy of record " + v.userCls.name);
	default:
		return unimplemented("as_proxy of " + v.kind);
	}
}

function mapValues<T>(v: MappingVariable, f: (value: Variable) => T): Map<DictKey, T> {
	const result = new Map<DictKey, T>();
	for (const entry of v.items.values()) result.set(entry.key, f(entry.value));
	return result;
}

/**
 * Iterate a container: sequence items, or mapping keys in insertion order.
 */
export function unpackVarSequence(tx: TraceContext, v: Variable): readonly Variable[] {
	if (isMappingVariable(v)) {
		const options = propagate(v);
		return [...v.items.values()].map(entry => keyToVar(tx, entry.key, options));
	}
	switch (v.kind) {
	case "tuple":
	case "list":
	case "set":
		return v.items;
	default:
		return unimplemented("iterate " + v.kind);
	}
}

/** Human-readable key list of a mapping, for diagnostics and guard details. */
export function describeKeys(v: MappingVariable): string {
	return "[" + [...v.items.values()].map(e => describeKey(e.key)).join(", ") + "]";
}
