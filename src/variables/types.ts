// symtrace Variable Domain
// Immutable symbolic stand-ins for host values during trace capture

import type { GuardSet } from "../guards.ts";
import { emptyGuards, unionGuards } from "../guards.ts";
import type {
	BuiltinName,
	HostClass,
	HostFunction,
	HostNNModule,
	HostObject,
	HostTensor,
	HostTuple,
	Literal,
} from "../host/values.ts";
import type { Source } from "../source.ts";

//==============================================================================
// Mutability
//==============================================================================

/**
 * Identity of a mutable host slot. Successive copy-on-write generations of
 * one variable share the same token.
 */
export interface MutableLocal {
	readonly kind: "mutableLocal";
	readonly id: number;
}

let nextMutableLocalId = 1;

export function newMutableLocal(): MutableLocal {
	return { kind: "mutableLocal", id: nextMutableLocalId++ };
}

//==============================================================================
// Dict Keys
//==============================================================================

export interface KeyTuple extends HostTuple {
	items: readonly DictKey[];
}

/** A normalized key: a literal, or the identity of a tensor, module or tuple. */
export type DictKey = Literal | HostTensor | HostNNModule | KeyTuple;

export interface DictEntry {
	readonly key: DictKey;
	readonly value: Variable;
}

/** Insertion-ordered entries keyed by `keyHash`. */
export type DictItems = ReadonlyMap<string, DictEntry>;

//==============================================================================
// Variable Domain
//==============================================================================

export type Variable =
	| ConstantVariable
	| TensorVariable
	| NNModuleVariable
	| TupleVariable
	| ListVariable
	| SetVariable
	| UserFunctionVariable
	| BuiltinVariable
	| ModuleVariable
	| UserDefinedObjectVariable
	| UserDefinedClassVariable
	| ConfigObjectVariable
	| DictVariable
	| DefaultDictVariable
	| DataClassVariable
	| CustomizedDictVariable
	| SysModulesVariable;

export type VariableKind = Variable["kind"];

export interface VariableCommon {
	readonly guards: GuardSet;
	readonly source?: Source | undefined;
	readonly mutableLocal?: MutableLocal | undefined;
	readonly recursivelyContains: ReadonlySet<MutableLocal>;
}

export interface VariableOptions {
	guards?: GuardSet;
	source?: Source | undefined;
	mutableLocal?: MutableLocal | undefined;
	recursivelyContains?: ReadonlySet<MutableLocal>;
}

/** Node of the numeric computation graph (built elsewhere). */
export interface GraphProxy {
	readonly kind: "proxy";
	readonly name: string;
}

export interface ConstantVariable extends VariableCommon {
	readonly kind: "constant";
	readonly value: Literal;
}

export interface TensorVariable extends VariableCommon {
	readonly kind: "tensor";
	readonly proxy: GraphProxy;
	/** Concrete identity this tensor was specialized to, if any */
	readonly specializedValue?: HostTensor | undefined;
}

export interface NNModuleVariable extends VariableCommon {
	readonly kind: "nnModule";
	readonly moduleKey: string;
}

export interface TupleVariable extends VariableCommon {
	readonly kind: "tuple";
	readonly items: readonly Variable[];
}

export interface ListVariable extends VariableCommon {
	readonly kind: "list";
	readonly items: readonly Variable[];
}

export interface SetVariable extends VariableCommon {
	readonly kind: "set";
	readonly items: readonly Variable[];
}

export interface UserFunctionVariable extends VariableCommon {
	readonly kind: "userFunction";
	readonly fn: HostFunction;
}

export interface BuiltinVariable extends VariableCommon {
	readonly kind: "builtin";
	readonly fn: BuiltinName;
}

export interface ModuleVariable extends VariableCommon {
	readonly kind: "module";
	readonly value: HostObject;
}

export interface UserDefinedObjectVariable extends VariableCommon {
	readonly kind: "userDefinedObject";
	readonly value: HostObject;
}

export interface UserDefinedClassVariable extends VariableCommon {
	readonly kind: "userDefinedClass";
	readonly value: HostClass;
}

/** Read-only attribute bag (pretrained model configurations). */
export interface ConfigObjectVariable extends VariableCommon {
	readonly kind: "configObject";
	readonly value: HostObject;
}

interface ConstDictFields extends VariableCommon {
	readonly items: DictItems;
	/** Host class this mapping stands for */
	readonly userCls: HostClass;
}

export interface DictVariable extends ConstDictFields {
	readonly kind: "dict";
}

export interface DefaultDictVariable extends ConstDictFields {
	readonly kind: "defaultDict";
	readonly defaultFactory?: Variable | undefined;
}

export interface DataClassVariable extends ConstDictFields {
	readonly kind: "dataClass";
	/** Keep `None`-valued fields as items instead of dropping them */
	readonly includeNone: boolean;
	/** Fields holding their schema default rather than an explicit argument */
	readonly defaultedFields: ReadonlySet<string>;
}

export interface CustomizedDictVariable extends ConstDictFields {
	readonly kind: "customizedDict";
}

/** The live module registry. Holds no snapshot of its entries. */
export interface SysModulesVariable extends VariableCommon {
	readonly kind: "sysModules";
}

export type MappingVariable =
	| DictVariable
	| DefaultDictVariable
	| DataClassVariable
	| CustomizedDictVariable;

export type SequenceVariable = TupleVariable | ListVariable | SetVariable;

export type Kwargs = ReadonlyMap<string, Variable>;

export const NO_KWARGS: Kwargs = new Map();

//==============================================================================
// Type Guards
//==============================================================================

export function isMappingVariable(v: Variable): v is MappingVariable {
	return (
		v.kind === "dict" ||
		v.kind === "defaultDict" ||
		v.kind === "dataClass" ||
		v.kind === "customizedDict"
	);
}

export function isSequenceVariable(v: Variable): v is SequenceVariable {
	return v.kind === "tuple" || v.kind === "list" || v.kind === "set";
}

//==============================================================================
// Common Fields
//==============================================================================

/**
 * Union of the children's contents and their own mutability tokens.
 */
export function collectContains(children: Iterable<Variable>): Set<MutableLocal> {
	const contains = new Set<MutableLocal>();
	for (const child of children) {
		for (const token of child.recursivelyContains) contains.add(token);
		if (child.mutableLocal !== undefined) contains.add(child.mutableLocal);
	}
	return contains;
}

/**
 * Build the common fields of a container. Children's guards are folded in.
 */
export function makeCommon(
	options: VariableOptions,
	children: readonly Variable[] = [],
): VariableCommon {
	return {
		guards: unionGuards(options.guards ?? emptyGuards(), ...children.map(c => c.guards)),
		source: options.source,
		mutableLocal: options.mutableLocal,
		recursivelyContains: options.recursivelyContains ?? collectContains(children),
	};
}

//==============================================================================
// Variable Constructors
//==============================================================================

export const constantVar = (value: Literal, options: VariableOptions = {}): ConstantVariable => ({
	...makeCommon(options),
	kind: "constant",
	value,
});

export const tensorVar = (
	proxy: GraphProxy,
	specializedValue?: HostTensor,
	options: VariableOptions = {},
): TensorVariable => ({
	...makeCommon(options),
	kind: "tensor",
	proxy,
	specializedValue,
});

export const nnModuleVar = (moduleKey: string, options: VariableOptions = {}): NNModuleVariable => ({
	...makeCommon(options),
	kind: "nnModule",
	moduleKey,
});

export const tupleVar = (items: readonly Variable[], options: VariableOptions = {}): TupleVariable => ({
	...makeCommon(options, items),
	kind: "tuple",
	items,
});

export const listVar = (items: readonly Variable[], options: VariableOptions = {}): ListVariable => ({
	...makeCommon(options, items),
	kind: "list",
	items,
});

export const setVar = (items: readonly Variable[], options: VariableOptions = {}): SetVariable => ({
	...makeCommon(options, items),
	kind: "set",
	items,
});

export const userFunctionVar = (
	fn: HostFunction,
	options: VariableOptions = {},
): UserFunctionVariable => ({
	...makeCommon(options),
	kind: "userFunction",
	fn,
});

export const builtinVar = (fn: BuiltinName, options: VariableOptions = {}): BuiltinVariable => ({
	...makeCommon(options),
	kind: "builtin",
	fn,
});

export const moduleVar = (
	value: HostObject,
	options: VariableOptions = {},
): ModuleVariable => ({
	...makeCommon(options),
	kind: "module",
	value,
});

export const userDefinedObjectVar = (
	value: HostObject,
	options: VariableOptions = {},
): UserDefinedObjectVariable => ({
	...makeCommon(options),
	kind: "userDefinedObject",
	value,
});

export const userDefinedClassVar = (
	value: HostClass,
	options: VariableOptions = {},
): UserDefinedClassVariable => ({
	...makeCommon(options),
	kind: "userDefinedClass",
	value,
});

export const proxy = (name: string): GraphProxy => ({ kind: "proxy", name });
