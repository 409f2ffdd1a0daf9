// symtrace Host Value Domain
// Live runtime values observed by the tracer

//==============================================================================
// Value Domain
//==============================================================================

export type Literal = null | boolean | number | string;

export type LiveValue =
	| Literal
	| HostTensor
	| HostNNModule
	| HostTuple
	| HostList
	| HostObject
	| HostFunction
	| HostBuiltin
	| HostClass;

export interface HostTensor {
	kind: "tensor";
	id: number;
	shape: readonly number[];
	dtype: string;
}

export interface HostNNModule {
	kind: "nnModule";
	id: number;
	name: string;
}

// Tuples compare structurally; they carry no identity
export interface HostTuple {
	kind: "tuple";
	items: readonly LiveValue[];
}

export interface HostList {
	kind: "list";
	id: number;
	items: readonly LiveValue[];
}

/**
 * Instance of a host class. Mapping classes keep their storage in `entries`
 * (insertion ordered); every class keeps instance attributes in `attrs`.
 */
export interface HostObject {
	kind: "object";
	id: number;
	cls: HostClass;
	attrs: ReadonlyMap<string, LiveValue>;
	entries?: readonly (readonly [LiveValue, LiveValue])[];
}

export interface HostFunction {
	kind: "function";
	id: number;
	name: string;
	/** Defining class for native methods (`__objclass__`) */
	owner?: HostClass;
	native: boolean;
}

export type BuiltinName = "list" | "tuple" | "dict" | "set" | "len" | "isinstance";

export interface HostBuiltin {
	kind: "builtin";
	name: BuiltinName;
}

export interface FieldSpec {
	name: string;
	hasDefault: boolean;
	default: Literal;
}

export interface HostClass {
	kind: "class";
	id: number;
	name: string;
	module: string;
	bases: readonly HostClass[];
	attrs: Map<string, LiveValue>;
	/** Present only for dataclasses */
	fields?: readonly FieldSpec[];
}

//==============================================================================
// Identity
//==============================================================================

let nextId = 1;

export function nextHostId(): number {
	return nextId++;
}

//==============================================================================
// Type Guards
//==============================================================================

export function isLiteral(v: LiveValue): v is Literal {
	return (
		v === null ||
		typeof v === "boolean" ||
		typeof v === "number" ||
		typeof v === "string"
	);
}

export function isHostObject(v: LiveValue): v is HostObject {
	return !isLiteral(v) && v.kind === "object";
}

export function isHostClass(v: LiveValue): v is HostClass {
	return !isLiteral(v) && v.kind === "class";
}

export function isHostFunction(v: LiveValue): v is HostFunction {
	return !isLiteral(v) && v.kind === "function";
}

//==============================================================================
// Value Constructors
//==============================================================================

export const hostTensor = (shape: readonly number[], dtype = "float32"): HostTensor => ({
	kind: "tensor",
	id: nextHostId(),
	shape,
	dtype,
});

export const hostNNModule = (name: string): HostNNModule => ({
	kind: "nnModule",
	id: nextHostId(),
	name,
});

export const hostTuple = (items: readonly LiveValue[]): HostTuple => ({
	kind: "tuple",
	items,
});

export const hostList = (items: readonly LiveValue[]): HostList => ({
	kind: "list",
	id: nextHostId(),
	items,
});

export const hostBuiltin = (name: BuiltinName): HostBuiltin => ({
	kind: "builtin",
	name,
});

export function hostFunction(
	name: string,
	owner?: HostClass,
	native = false,
): HostFunction {
	const fn: HostFunction = { kind: "function", id: nextHostId(), name, native };
	if (owner !== undefined) fn.owner = owner;
	return fn;
}

export function hostObject(
	cls: HostClass,
	attrs: Iterable<readonly [string, LiveValue]> = [],
	entries?: readonly (readonly [LiveValue, LiveValue])[],
): HostObject {
	const obj: HostObject = {
		kind: "object",
		id: nextHostId(),
		cls,
		attrs: new Map(attrs),
	};
	if (entries !== undefined) obj.entries = entries;
	return obj;
}

/**
 * Render a live value for diagnostics.
 */
export function describeLive(v: LiveValue): string {
	if (isLiteral(v)) return v === null ? "None" : JSON.stringify(v);
	switch (v.kind) {
	case "tensor":
		return "Tensor#" + String(v.id);
	case "nnModule":
		return "Module(" + v.name + ")";
	case "tuple":
		return "(" + v.items.map(describeLive).join(", ") + (v.items.length === 1 ? ",)" : ")");
	case "list":
		return "[" + v.items.map(describeLive).join(", ") + "]";
	case "object":
		return v.cls.name + "#" + String(v.id);
	case "function":
		return "<function " + v.name + ">";
	case "builtin":
		return "<builtin " + v.name + ">";
	case "class":
		return "<class " + v.module + "." + v.name + ">";
	}
}
