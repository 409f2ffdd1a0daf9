// symtrace Module Registry Variable
// `sys.modules`: queried live, guarded one key at a time

import { wrapDictSnapshot } from "../builder.ts";
import type { Codegen } from "../codegen.ts";
import { TraceError } from "../errors.ts";
import type { GuardSet } from "../guards.ts";
import { guardSet, membershipGuard, unionGuards } from "../guards.ts";
import type { LiveValue } from "../host/values.ts";
import type { Source } from "../source.ts";
import { attrSource, getItemSource, moduleSource } from "../source.ts";
import { addOptions, argAt, expectArgs, propagate } from "./base.ts";
import type { TraceContext } from "./context.ts";
import { callMethod } from "./dispatch.ts";
import { describeKey, globalKeyName, isGlobalRefKey, keyHash, liveKeyToDictKey } from "./keys.ts";
import { requireKey } from "./dicts.ts";
import type { DictKey, Kwargs, SysModulesVariable, Variable, VariableOptions } from "./types.ts";
import { constantVar, makeCommon } from "./types.ts";

export const SYS_MODULES_SOURCE: Source = attrSource(moduleSource("sys"), "modules");

export function createSysModules(options: VariableOptions = {}): SysModulesVariable {
	return {
		...makeCommon({ ...options, source: options.source ?? SYS_MODULES_SOURCE }),
		kind: "sysModules",
	};
}

//==============================================================================
// Live Lookups
//==============================================================================

interface Membership {
	key: DictKey;
	/** Live entry value when present */
	live: LiveValue | undefined;
	present: boolean;
	guards: GuardSet;
}

function lookupLive(tx: TraceContext, key: DictKey): { present: boolean; live: LiveValue | undefined } {
	const hash = keyHash(key);
	for (const [liveKey, value] of tx.host.modules.entries ?? []) {
		const normalized = liveKeyToDictKey(liveKey);
		if (normalized !== undefined && keyHash(normalized) === hash) {
			return { present: true, live: value };
		}
	}
	return { present: false, live: undefined };
}

/**
 * Query membership and synthesize the single guard pinning its outcome.
 */
function membership(tx: TraceContext, self: SysModulesVariable, arg: Variable, method: string): Membership {
	const key = requireKey(tx, arg, method);
	const { present, live } = lookupLive(tx, key);
	const guard = membershipGuard(self.source ?? SYS_MODULES_SOURCE, describeKey(key), present);
	return {
		key,
		live,
		present,
		guards: unionGuards(self.guards, arg.guards, guardSet([guard])),
	};
}

function wrapEntry(tx: TraceContext, self: SysModulesVariable, found: Membership): Variable {
	if (found.live === undefined) return constantVar(null, { guards: found.guards });
	const base = self.source ?? SYS_MODULES_SOURCE;
	const source = isGlobalRefKey(found.key)
		? getItemSource(base, globalKeyName(found.key), true)
		: getItemSource(base, found.key);
	return addOptions(tx.wrap(found.live, source), { guards: found.guards });
}

//==============================================================================
// Method Dispatch
//==============================================================================

export function callSysModulesMethod(
	tx: TraceContext,
	self: SysModulesVariable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	switch (name) {
	case "__contains__": {
		expectArgs(name, args, kwargs, 1);
		const found = membership(tx, self, argAt(args, 0, name), name);
		return constantVar(found.present, { guards: found.guards });
	}
	case "get": {
		expectArgs(name, args, kwargs, 1, 2);
		const found = membership(tx, self, argAt(args, 0, name), name);
		if (found.present) return wrapEntry(tx, self, found);
		const fallback = args[1];
		if (fallback !== undefined) return addOptions(fallback, { guards: found.guards });
		return constantVar(null, { guards: found.guards });
	}
	case "__getitem__": {
		expectArgs(name, args, kwargs, 1);
		const found = membership(tx, self, argAt(args, 0, name), name);
		if (!found.present) throw TraceError.keyMissing(describeKey(found.key));
		return wrapEntry(tx, self, found);
	}
	default:
		return callSnapshot(tx, self, name, args, kwargs);
	}
}

/**
 * Materialize the whole registry and re-dispatch. Guards every key.
 */
function callSnapshot(
	tx: TraceContext,
	self: SysModulesVariable,
	name: string,
	args: readonly Variable[],
	kwargs: Kwargs,
): Variable {
	if (tx.config.warnOnSnapshotFallback) {
		console.warn("[SysModules] " + name + " falls back to a snapshot of every module");
	}
	const snapshot = addOptions(
		wrapDictSnapshot(tx, tx.host.modules, self.source),
		propagate(self, args, kwargs.values()),
	);
	return callMethod(tx, snapshot, name, args, kwargs);
}

export function reconstructSysModules(codegen: Codegen): void {
	codegen.loadModule("sys");
	codegen.loadAttr("modules");
}
