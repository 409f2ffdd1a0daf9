import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes, isTraceError } from "../src/errors.ts";
import { guardSet, isSuperset, makeGuard } from "../src/guards.ts";
import { dictClass, orderedDictClass } from "../src/host/object-model.ts";
import { hostTensor } from "../src/host/values.ts";
import { localSource } from "../src/source.ts";
import { createDict, dictItems, parseDictMethod } from "../src/variables/dicts.ts";
import { asConstant, asProxy } from "../src/variables/dispatch.ts";
import { globalKeyName } from "../src/variables/keys.ts";
import type { DictKey, Kwargs, MappingVariable, Variable } from "../src/variables/types.ts";
import {
	builtinVar,
	constantVar,
	isMappingVariable,
	listVar,
	newMutableLocal,
	proxy,
	tensorVar,
	tupleVar,
	userDefinedClassVar,
} from "../src/variables/types.ts";
import { createTracer, evaluate, keysOf, valueOf } from "./helpers/fixtures.ts";

function mapping(v: Variable | undefined): MappingVariable {
	assert.ok(v !== undefined && isMappingVariable(v));
	return v;
}

function mutableDict(entries: (readonly [DictKey, Variable])[]): MappingVariable {
	return createDict(dictItems(entries), dictClass, { mutableLocal: newMutableLocal() });
}

function traceErrorCode(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (error) {
		if (isTraceError(error)) return error.code;
		throw error;
	}
	return undefined;
}

const kw = (entries: [string, Variable][]): Kwargs => new Map(entries);

describe("Dict method names", () => {
	it("parses supported methods only", () => {
		assert.equal(parseDictMethod("update"), "update");
		assert.equal(parseDictMethod("popitem"), undefined);
	});

	it("unsupported methods abort the region", () => {
		const tx = createTracer();
		assert.equal(traceErrorCode(() => tx.callMethod(mutableDict([]), "popitem", [])), ErrorCodes.Unsupported);
	});
});

describe("Copy-on-write mutation", () => {
	it("setitem publishes a new variable and leaves the receiver unchanged", () => {
		const tx = createTracer();
		const d = mutableDict([["a", constantVar(1)]]);
		tx.setLocal("d", d);
		const result = mapping(tx.callMethod(d, "__setitem__", [constantVar("b"), constantVar(2)]));

		assert.notEqual(result, d);
		assert.deepEqual(keysOf(d.items), ["a"]);
		assert.deepEqual(keysOf(result.items), ["a", "b"]);
		assert.equal(result.mutableLocal, d.mutableLocal);
		assert.equal(tx.getLocal("d"), result);
	});

	it("containers holding the mapping see the new generation", () => {
		const tx = createTracer();
		const d = mutableDict([]);
		const outer = listVar([d, constantVar(0)], { mutableLocal: newMutableLocal() });
		tx.setLocal("outer", outer);
		const result = tx.callMethod(d, "__setitem__", [constantVar("k"), constantVar(1)]);

		const replaced = tx.getLocal("outer");
		assert.ok(replaced?.kind === "list");
		assert.equal(replaced.items[0], result);
	});

	it("enclosing mappings take on the guards of the new generation", () => {
		const tx = createTracer();
		const inner = mutableDict([]);
		const outer = mutableDict([["inner", inner]]);
		tx.setLocal("outer", outer);
		const shape = makeGuard("TENSOR_MATCH", localSource("t"), "float32[2]");
		const t = tensorVar(proxy("t"), hostTensor([2]), { guards: guardSet([shape]) });
		const result = mapping(tx.callMethod(inner, "__setitem__", [constantVar("k"), t]));
		assert.equal(result.guards.has(shape.name), true);

		const replaced = mapping(tx.getLocal("outer"));
		assert.equal(replaced.items.get("s:inner")?.value, result);
		assert.equal(replaced.guards.has(shape.name), true);
		assert.equal(outer.guards.has(shape.name), false);
	});

	it("setitem on an immutable mapping yields a fresh mutable copy", () => {
		const tx = createTracer();
		const d = createDict(dictItems([["a", constantVar(1)]]));
		const result = mapping(tx.callMethod(d, "__setitem__", [constantVar("a"), constantVar(2)]));
		assert.equal(d.mutableLocal, undefined);
		assert.notEqual(result.mutableLocal, undefined);
		assert.equal(valueOf(tx.callMethod(result, "__getitem__", [constantVar("a")])), 2);
	});

	it("overwriting a key keeps its position", () => {
		const tx = createTracer();
		const d = mutableDict([["a", constantVar(1)], ["b", constantVar(2)]]);
		const result = mapping(tx.callMethod(d, "__setitem__", [constantVar("a"), constantVar(10)]));
		assert.deepEqual(keysOf(result.items), ["a", "b"]);

		const codegen = tx.reconstruct(result);
		const rebuilt = evaluate(codegen.instructions, { host: tx.host });
		assert.ok(rebuilt !== null && typeof rebuilt === "object" && rebuilt.kind === "object");
		assert.equal(rebuilt.cls, dictClass);
		assert.deepEqual(rebuilt.entries, [["a", 10], ["b", 2]]);
	});

	it("guards only grow across mutation", () => {
		const tx = createTracer();
		const keysGuard = makeGuard("DICT_KEYS", localSource("d"), "[\"a\"]");
		const d = createDict(dictItems([["a", constantVar(1)]]), dictClass, {
			guards: guardSet([keysGuard]),
			mutableLocal: newMutableLocal(),
		});
		const result = mapping(tx.callMethod(d, "__setitem__", [constantVar("b"), constantVar(2)]));
		assert.equal(isSuperset(result.guards, d.guards), true);
		assert.equal(result.guards.has(keysGuard.name), true);
	});
});

describe("Key normalization", () => {
	it("True and 1 address the same entry", () => {
		const tx = createTracer();
		const d = mutableDict([]);
		const stored = tx.callMethod(d, "__setitem__", [constantVar(true), constantVar("x")]);
		assert.equal(valueOf(tx.callMethod(stored, "__getitem__", [constantVar(1)])), "x");
		assert.equal(valueOf(tx.callMethod(stored, "__contains__", [constantVar(1)])), true);
		assert.deepEqual(keysOf(mapping(stored).items), [true]);
	});

	it("rejected keys abort as Unsupported, missing keys as KeyMissing", () => {
		const tx = createTracer();
		const d = mutableDict([["a", constantVar(1)]]);
		assert.equal(traceErrorCode(() => tx.callMethod(d, "__getitem__", [listVar([])])), ErrorCodes.Unsupported);
		assert.equal(traceErrorCode(() => tx.callMethod(d, "__getitem__", [constantVar("z")])), ErrorCodes.KeyMissing);
	});

	it("contains with an unhashable argument is unsupported", () => {
		const tx = createTracer();
		assert.throws(
			() => tx.callMethod(mutableDict([]), "__contains__", [tupleVar([listVar([])])]),
			/Unsupported: NYI - __contains__ with tuple of 1/,
		);
	});

	it("identity keys are stored through a weak-ref global", () => {
		const tx = createTracer();
		const t = hostTensor([3]);
		const key = tupleVar([tensorVar(proxy("tensor_k"), t), constantVar(1)]);
		const d = mutableDict([]);
		const result = mapping(tx.callMethod(d, "__setitem__", [key, constantVar("v")]));

		const tupleKey = { kind: "tuple", items: [t, 1] } as const;
		const name = globalKeyName(tupleKey);
		assert.deepEqual(tx.globalWeakrefs.get(name), tupleKey);
		assert.equal(valueOf(tx.callMethod(result, "__getitem__", [key])), "v");

		const codegen = tx.reconstruct(result);
		assert.deepEqual(codegen.instructions, [
			{ op: "LOAD_GLOBAL", name },
			{ op: "CALL_FUNCTION", argc: 0 },
			{ op: "LOAD_CONST", value: "v" },
			{ op: "BUILD_MAP", count: 1 },
		]);
		assert.deepEqual([...codegen.declaredGlobals], [name]);
		const rebuilt = evaluate(codegen.instructions, { host: tx.host, weakrefs: tx.globalWeakrefs });
		assert.ok(rebuilt !== null && typeof rebuilt === "object" && rebuilt.kind === "object");
		assert.equal(rebuilt.entries?.[0]?.[0], tx.globalWeakrefs.get(name));
		assert.equal(rebuilt.entries?.[0]?.[1], "v");
	});
});

describe("Read-only methods", () => {
	const tx = createTracer();
	const d = mutableDict([["a", constantVar(1)], ["b", constantVar(2)]]);

	it("items yields key-value pairs in order", () => {
		const items = tx.callMethod(d, "items", []);
		assert.equal(items.kind, "tuple");
		if (items.kind !== "tuple") return;
		assert.deepEqual(
			items.items.map(pair => (pair.kind === "tuple" ? pair.items.map(valueOf) : [])),
			[["a", 1], ["b", 2]],
		);
	});

	it("keys is a fresh mutable set", () => {
		const keys = tx.callMethod(d, "keys", []);
		assert.equal(keys.kind, "set");
		assert.notEqual(keys.mutableLocal, undefined);
		assert.notEqual(keys.mutableLocal, d.mutableLocal);
		assert.deepEqual(keys.kind === "set" ? keys.items.map(valueOf) : [], ["a", "b"]);
	});

	it("values and length", () => {
		const values = tx.callMethod(d, "values", []);
		assert.deepEqual(values.kind === "tuple" ? values.items.map(valueOf) : [], [1, 2]);
		assert.equal(valueOf(tx.callMethod(d, "__len__", [])), 2);
		assert.equal(valueOf(tx.callFunction(builtinVar("len"), [d])), 2);
	});

	it("get returns the value, the default, or aborts", () => {
		assert.equal(valueOf(tx.callMethod(d, "get", [constantVar("a"), constantVar(0)])), 1);
		assert.equal(valueOf(tx.callMethod(d, "get", [constantVar("z"), constantVar(0)])), 0);
		assert.equal(traceErrorCode(() => tx.callMethod(d, "get", [constantVar("z")])), ErrorCodes.Unsupported);
	});

	it("keyword arguments are not accepted", () => {
		assert.equal(
			traceErrorCode(() => tx.callMethod(d, "get", [constantVar("a")], kw([["default", constantVar(0)]]))),
			ErrorCodes.Unsupported,
		);
	});

	it("results carry the receiver's guards", () => {
		const guard = makeGuard("DICT_KEYS", localSource("g"), "[\"a\"]");
		const guarded = createDict(dictItems([["a", constantVar(1)]]), dictClass, { guards: guardSet([guard]) });
		assert.equal(tx.callMethod(guarded, "__getitem__", [constantVar("a")]).guards.has(guard.name), true);
		assert.equal(tx.callMethod(guarded, "__len__", []).guards.has(guard.name), true);
	});
});

describe("pop", () => {
	it("removes a present key", () => {
		const tx = createTracer();
		const d = mutableDict([["a", constantVar(1)], ["b", constantVar(2)]]);
		tx.setLocal("d", d);
		assert.equal(valueOf(tx.callMethod(d, "pop", [constantVar("a")])), 1);
		assert.deepEqual(keysOf(mapping(tx.getLocal("d")).items), ["b"]);
	});

	it("returns the default itself for an absent key and publishes nothing", () => {
		const tx = createTracer();
		const d = mutableDict([["a", constantVar(1)]]);
		tx.setLocal("d", d);
		const fallback = constantVar("fallback");
		assert.equal(tx.callMethod(d, "pop", [constantVar("z"), fallback]), fallback);
		assert.equal(tx.getLocal("d"), d);
	});

	it("absent key without a default is KeyMissing", () => {
		const tx = createTracer();
		assert.equal(traceErrorCode(() => tx.callMethod(mutableDict([]), "pop", [constantVar("z")])), ErrorCodes.KeyMissing);
	});

	it("requires a mutable mapping", () => {
		const tx = createTracer();
		const frozen = createDict(dictItems([["a", constantVar(1)]]));
		assert.equal(traceErrorCode(() => tx.callMethod(frozen, "pop", [constantVar("a")])), ErrorCodes.Unsupported);
	});
});

describe("update", () => {
	it("appends new keys after existing ones and overwrites in place", () => {
		const tx = createTracer();
		const d = mutableDict([["a", constantVar(1)], ["b", constantVar(2)]]);
		const other = mutableDict([["b", constantVar(20)], ["c", constantVar(3)]]);
		tx.setLocal("d", d);
		const result = mapping(tx.callMethod(d, "update", [other]));

		assert.equal(tx.getLocal("d"), result);
		assert.deepEqual(keysOf(result.items), ["a", "b", "c"]);
		assert.deepEqual([...result.items.values()].map(e => valueOf(e.value)), [1, 20, 3]);
	});

	it("rejects an immutable receiver and non-mapping arguments", () => {
		const tx = createTracer();
		const frozen = createDict(dictItems([]));
		assert.equal(traceErrorCode(() => tx.callMethod(frozen, "update", [mutableDict([])])), ErrorCodes.Unsupported);
		assert.equal(traceErrorCode(() => tx.callMethod(mutableDict([]), "update", [listVar([])])), ErrorCodes.Unsupported);
	});
});

describe("Construction through calls", () => {
	it("dict(**kwargs) builds a mutable dict", () => {
		const tx = createTracer();
		const d = mapping(tx.callFunction(builtinVar("dict"), [], kw([["x", constantVar(1)]])));
		assert.deepEqual(keysOf(d.items), ["x"]);
		assert.notEqual(d.mutableLocal, undefined);
	});

	it("dict(pairs) reads a sequence of 2-tuples", () => {
		const tx = createTracer();
		const pairs = listVar([
			tupleVar([constantVar("a"), constantVar(1)]),
			tupleVar([constantVar("b"), constantVar(2)]),
		]);
		const d = mapping(tx.callFunction(builtinVar("dict"), [pairs]));
		assert.deepEqual(keysOf(d.items), ["a", "b"]);
	});

	it("dict(pairs) accepts identity keys", () => {
		const tx = createTracer();
		const live = hostTensor([3]);
		const pairs = listVar([tupleVar([tensorVar(proxy("t"), live), constantVar(1)])]);
		const d = mapping(tx.callFunction(builtinVar("dict"), [pairs]));
		assert.deepEqual(keysOf(d.items), [live]);
		assert.equal(tx.globalWeakrefs.get(globalKeyName(live)), live);
	});

	it("OrderedDict() rebuilds through the collections module", () => {
		const tx = createTracer();
		const d = mapping(tx.callFunction(userDefinedClassVar(orderedDictClass), [], kw([["k", constantVar(1)]])));
		assert.equal(d.userCls, orderedDictClass);

		const codegen = tx.reconstruct(d);
		assert.deepEqual(codegen.instructions, [
			{ op: "IMPORT_NAME", name: "collections" },
			{ op: "LOAD_ATTR", name: "OrderedDict" },
			{ op: "LOAD_CONST", value: "k" },
			{ op: "LOAD_CONST", value: 1 },
			{ op: "BUILD_MAP", count: 1 },
			{ op: "CALL_FUNCTION", argc: 1 },
		]);
		const rebuilt = evaluate(codegen.instructions, { host: tx.host });
		assert.ok(rebuilt !== null && typeof rebuilt === "object" && rebuilt.kind === "object");
		assert.equal(rebuilt.cls, orderedDictClass);
		assert.deepEqual(rebuilt.entries, [["k", 1]]);
	});
});

describe("Projections", () => {
	it("asConstant folds constant mappings", () => {
		const d = mutableDict([["a", constantVar(1)], ["b", tupleVar([constantVar(2)])]]);
		assert.deepEqual(asConstant(d), new Map<DictKey, unknown>([["a", 1], ["b", [2]]]));
	});

	it("asConstant rejects tensors, asProxy keeps them", () => {
		const p = proxy("tensor_x");
		const d = mutableDict([["t", tensorVar(p)]]);
		assert.throws(() => asConstant(d), /Unsupported: tensor is not a constant/);
		assert.deepEqual(asProxy(d), new Map([["t", p]]));
	});
});
