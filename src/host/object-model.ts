// symtrace Host Object Model
// Class introspection oracles and the builtin mapping classes

import type {
	FieldSpec,
	HostClass,
	HostFunction,
	HostObject,
	LiveValue,
} from "./values.ts";
import { hostFunction, isHostFunction, nextHostId } from "./values.ts";

//==============================================================================
// Class Definition
//==============================================================================

export interface ClassOptions {
	module?: string;
	bases?: readonly HostClass[];
	fields?: readonly FieldSpec[];
	/** Methods defined by this class (user code unless `native`) */
	methods?: readonly string[];
	native?: boolean;
}

/**
 * Define a host class. Each listed method becomes a function owned by the
 * new class.
 */
export function defineClass(name: string, options: ClassOptions = {}): HostClass {
	const cls: HostClass = {
		kind: "class",
		id: nextHostId(),
		name,
		module: options.module ?? "__main__",
		bases: options.bases ?? [],
		attrs: new Map(),
	};
	if (options.fields !== undefined) cls.fields = options.fields;
	for (const method of options.methods ?? []) {
		cls.attrs.set(method, hostFunction(method, cls, options.native ?? false));
	}
	return cls;
}

/** Dataclass field without a default. */
export const field = (name: string): FieldSpec => ({ name, hasDefault: false, default: null });

/** Dataclass field with a literal default. */
export const fieldWithDefault = (name: string, value: FieldSpec["default"]): FieldSpec => ({
	name,
	hasDefault: true,
	default: value,
});

//==============================================================================
// Builtin Classes
//==============================================================================

const DICT_METHODS = [
	"__init__",
	"__getitem__",
	"__setitem__",
	"__delitem__",
	"__contains__",
	"__len__",
	"__iter__",
	"get",
	"pop",
	"items",
	"keys",
	"values",
	"update",
	"setdefault",
	"clear",
	"copy",
];

export const objectClass = defineClass("object", {
	module: "builtins",
	methods: ["__init__", "__setattr__", "__getattribute__"],
	native: true,
});

export const dictClass = defineClass("dict", {
	module: "builtins",
	bases: [objectClass],
	methods: DICT_METHODS,
	native: true,
});

export const orderedDictClass = defineClass("OrderedDict", {
	module: "collections",
	bases: [dictClass],
	methods: ["__init__", "__setitem__", "__delitem__", "__iter__", "pop", "move_to_end", "popitem"],
	native: true,
});

export const defaultDictClass = defineClass("defaultdict", {
	module: "collections",
	bases: [dictClass],
	methods: ["__init__", "__missing__", "copy"],
	native: true,
});

export const moduleClass = defineClass("module", {
	module: "builtins",
	bases: [objectClass],
	native: true,
});

//==============================================================================
// Introspection
//==============================================================================

/**
 * Method resolution order: depth-first, left-to-right, duplicates keep
 * their last position.
 */
export function mro(cls: HostClass): HostClass[] {
	const order: HostClass[] = [];
	const visit = (c: HostClass): void => {
		order.push(c);
		for (const base of c.bases) visit(base);
	};
	visit(cls);
	return order.filter((c, i) => order.lastIndexOf(c) === i);
}

export function isSubclass(cls: HostClass, base: HostClass): boolean {
	return mro(cls).includes(base);
}

/**
 * Resolve an attribute through the class hierarchy.
 */
export function lookupAttr(cls: HostClass, name: string): LiveValue | undefined {
	for (const c of mro(cls)) {
		if (c.attrs.has(name)) return c.attrs.get(name);
	}
	return undefined;
}

export function lookupMethod(cls: HostClass, name: string): HostFunction | undefined {
	const attr = lookupAttr(cls, name);
	return attr !== undefined && isHostFunction(attr) ? attr : undefined;
}

export function classHasAttr(cls: HostClass, name: string): boolean {
	return lookupAttr(cls, name) !== undefined;
}

export function isDataclass(cls: HostClass): boolean {
	return dataclassFields(cls) !== undefined;
}

/**
 * Dataclass fields of the most derived dataclass in the hierarchy.
 */
export function dataclassFields(cls: HostClass): readonly FieldSpec[] | undefined {
	for (const c of mro(cls)) {
		if (c.fields !== undefined) return c.fields;
	}
	return undefined;
}

export function hasAttr(obj: HostObject, name: string): boolean {
	return obj.attrs.has(name) || classHasAttr(obj.cls, name);
}

export function getAttr(obj: HostObject, name: string): LiveValue | undefined {
	if (obj.attrs.has(name)) return obj.attrs.get(name);
	return lookupAttr(obj.cls, name);
}

export function qualifiedName(cls: HostClass): string {
	return cls.module === "builtins" ? cls.name : cls.module + "." + cls.name;
}
