// symtrace Test Fixtures
// Shared host classes, tracer construction and a tiny instruction evaluator

import {
	dataclassFields,
	defaultDictClass,
	defineClass,
	dictClass,
	field,
	fieldWithDefault,
	getAttr,
	orderedDictClass,
} from "../../src/host/object-model.ts";
import { createHostRuntime } from "../../src/host/runtime.ts";
import type { HostRuntime } from "../../src/host/runtime.ts";
import type { HostClass, HostObject, LiveValue } from "../../src/host/values.ts";
import { hostList, hostObject, hostTuple, isHostClass, isHostObject } from "../../src/host/values.ts";
import type { ConstOperand, Instruction } from "../../src/codegen.ts";
import type { TracerOptions } from "../../src/tracer.ts";
import { Tracer } from "../../src/tracer.ts";
import type { DictKey, Variable } from "../../src/variables/types.ts";

//==============================================================================
// Host Classes
//==============================================================================

/** Third-party record-output base: an ordered mapping with its own hooks. */
export const recordOutputBase = defineClass("ModelOutput", {
	module: "transformers.utils.generic",
	bases: [orderedDictClass],
	methods: ["__post_init__", "__getitem__", "__setitem__", "__setattr__", "to_tuple"],
});

/** Record output declared in the configured output module. */
export const modelOutputClass = defineClass("BaseModelOutput", {
	module: "transformers.modeling_outputs",
	bases: [recordOutputBase],
	fields: [
		fieldWithDefault("last_hidden_state", null),
		fieldWithDefault("hidden_states", null),
		fieldWithDefault("attentions", null),
	],
});

/** Record output declared outside the output module. */
export const customOutputClass = defineClass("CustomOutput", {
	module: "my_project.outputs",
	bases: [recordOutputBase],
	fields: [field("a"), fieldWithDefault("b", null), fieldWithDefault("c", 3)],
});

export const pointClass = defineClass("Point", {
	module: "geometry",
	fields: [field("x"), field("y"), fieldWithDefault("label", null)],
});

export const pretrainedConfigBase = defineClass("PretrainedConfig", {
	module: "transformers.configuration_utils",
});

export function createTestRuntime(modules: Iterable<readonly [string, LiveValue]> = []): HostRuntime {
	return createHostRuntime(modules, {
		recordOutputBase,
		pretrainedConfigBase,
	});
}

export function createTracer(options: TracerOptions = {}): Tracer {
	return new Tracer({ host: createTestRuntime(), ...options });
}

export function keysOf(items: ReadonlyMap<string, { key: DictKey }>): DictKey[] {
	return [...items.values()].map(e => e.key);
}

export function valueOf(v: Variable): unknown {
	return v.kind === "constant" ? v.value : v.kind;
}

//==============================================================================
// Instruction Evaluator
//==============================================================================

interface WeakSlot {
	kind: "weakref";
	target: DictKey;
}

interface ModuleRef {
	kind: "moduleRef";
	name: string;
}

interface KeywordNames {
	kind: "names";
	names: readonly string[];
}

type EvalValue = LiveValue | WeakSlot | ModuleRef | KeywordNames;

export interface EvalEnv {
	host: HostRuntime;
	locals?: ReadonlyMap<string, LiveValue>;
	weakrefs?: ReadonlyMap<string, DictKey>;
	graphOutputs?: ReadonlyMap<string, LiveValue>;
}

function isNames(v: ConstOperand): v is readonly string[] {
	return Array.isArray(v);
}

function asLive(v: EvalValue | undefined): LiveValue {
	if (v === undefined) throw new Error("stack underflow");
	if (v === null || typeof v !== "object") return v;
	switch (v.kind) {
	case "weakref":
	case "moduleRef":
	case "names":
		throw new Error("not a live value: " + v.kind);
	default:
		return v;
	}
}

function moduleAttr(name: string, attr: string, host: HostRuntime): LiveValue {
	if (name === "collections" && attr === "OrderedDict") return orderedDictClass;
	if (name === "collections" && attr === "defaultdict") return defaultDictClass;
	if (name === "sys" && attr === "modules") return host.modules;
	throw new Error("unknown attribute " + name + "." + attr);
}

function popN(stack: EvalValue[], n: number): EvalValue[] {
	if (stack.length < n) throw new Error("stack underflow");
	return stack.splice(stack.length - n, n);
}

function pairs(values: EvalValue[]): (readonly [LiveValue, LiveValue])[] {
	const entries: (readonly [LiveValue, LiveValue])[] = [];
	for (let i = 0; i < values.length; i += 2) entries.push([asLive(values[i]), asLive(values[i + 1])]);
	return entries;
}

function call(callee: EvalValue | undefined, args: EvalValue[]): EvalValue {
	if (callee !== null && typeof callee === "object" && callee.kind === "weakref") return callee.target;
	const cls = asLive(callee);
	if (!isHostClass(cls)) throw new Error("not callable");
	if (cls === defaultDictClass) {
		const mapping = asLive(args[1]);
		if (!isHostObject(mapping)) throw new Error("defaultdict expects a mapping");
		return hostObject(defaultDictClass, [["default_factory", asLive(args[0])]], mapping.entries ?? []);
	}
	const mapping = asLive(args[0]);
	if (!isHostObject(mapping)) throw new Error(cls.name + " expects a mapping");
	return hostObject(cls, [], mapping.entries ?? []);
}

function callKw(cls: HostClass, names: readonly string[], values: EvalValue[]): HostObject {
	const attrs = new Map<string, LiveValue>();
	for (const spec of dataclassFields(cls) ?? []) {
		if (spec.hasDefault) attrs.set(spec.name, spec.default);
	}
	names.forEach((name, i) => attrs.set(name, asLive(values[i])));
	return hostObject(cls, attrs);
}

/**
 * Execute reconstruction output and return the single value it leaves.
 */
export function evaluate(instructions: readonly Instruction[], env: EvalEnv): LiveValue {
	const stack: EvalValue[] = [];
	for (const ins of instructions) {
		switch (ins.op) {
		case "LOAD_CONST":
			stack.push(isNames(ins.value) ? { kind: "names", names: ins.value } : ins.value);
			break;
		case "LOAD_GLOBAL": {
			const target = env.weakrefs?.get(ins.name);
			if (target !== undefined) {
				stack.push({ kind: "weakref", target });
			} else if (ins.name === "list" || ins.name === "tuple" || ins.name === "dict") {
				stack.push({ kind: "builtin", name: ins.name });
			} else {
				throw new Error("unknown global " + ins.name);
			}
			break;
		}
		case "LOAD_FAST": {
			const local = env.locals?.get(ins.name);
			if (local === undefined) throw new Error("unbound local " + ins.name);
			stack.push(local);
			break;
		}
		case "IMPORT_NAME":
			stack.push({ kind: "moduleRef", name: ins.name });
			break;
		case "LOAD_ATTR": {
			const base = stack.pop();
			if (base !== null && typeof base === "object" && base.kind === "moduleRef") {
				stack.push(moduleAttr(base.name, ins.name, env.host));
				break;
			}
			const obj = asLive(base);
			if (!isHostObject(obj)) throw new Error("attribute of non-object");
			const attr = getAttr(obj, ins.name);
			if (attr === undefined) throw new Error("missing attribute " + ins.name);
			stack.push(attr);
			break;
		}
		case "BINARY_SUBSCR": {
			const [container, index] = popN(stack, 2);
			const obj = asLive(container);
			const key = asLive(index);
			if (!isHostObject(obj)) throw new Error("subscript of non-mapping");
			const entry = (obj.entries ?? []).find(([k]) => k === key);
			if (entry === undefined) throw new Error("missing key");
			stack.push(entry[1]);
			break;
		}
		case "BUILD_MAP":
			stack.push(hostObject(dictClass, [], pairs(popN(stack, ins.count * 2))));
			break;
		case "BUILD_TUPLE":
			stack.push(hostTuple(popN(stack, ins.count).map(asLive)));
			break;
		case "BUILD_LIST":
		case "BUILD_SET":
			stack.push(hostList(popN(stack, ins.count).map(asLive)));
			break;
		case "CALL_FUNCTION": {
			const args = popN(stack, ins.argc);
			stack.push(call(stack.pop(), args));
			break;
		}
		case "CALL_FUNCTION_KW": {
			const names = stack.pop();
			if (names === null || typeof names !== "object" || names.kind !== "names") {
				throw new Error("keyword names expected");
			}
			const values = popN(stack, ins.argc);
			const cls = asLive(stack.pop());
			if (!isHostClass(cls)) throw new Error("keyword call of non-class");
			stack.push(callKw(cls, names.names, values));
			break;
		}
		case "LOAD_GRAPH_OUTPUT": {
			const output = env.graphOutputs?.get(ins.name);
			if (output === undefined) throw new Error("unknown graph output " + ins.name);
			stack.push(output);
			break;
		}
		}
	}
	if (stack.length !== 1) throw new Error("expected one value, found " + String(stack.length));
	return asLive(stack[0]);
}
