// symtrace Trace Context
// What mapping variables need from the tracer driving them

import type { TraceConfig } from "../config.ts";
import type { HostRuntime } from "../host/runtime.ts";
import type { HostNNModule, LiveValue } from "../host/values.ts";
import type { Source } from "../source.ts";
import type { DictKey, Kwargs, UserFunctionVariable, Variable } from "./types.ts";

export interface TraceContext {
	readonly config: TraceConfig;
	readonly host: HostRuntime;

	/**
	 * Substitute `newVar` for every live reference to `oldVar` and return
	 * `newVar`. This is how copy-on-write mutations become visible.
	 */
	replaceAll(oldVar: Variable, newVar: Variable): Variable;

	/** Idempotent; the name is later resolved by a global load */
	storeGlobalWeakref(name: string, value: DictKey): void;

	registerNNModule(module: HostNNModule): string;
	lookupNNModule(key: string): HostNNModule | undefined;

	/** Value-wrapping entry point */
	wrap(value: LiveValue, source?: Source): Variable;

	/** Re-enter symbolic execution on a user-defined function body */
	inlineUserFunctionReturn(
		fn: UserFunctionVariable,
		args: readonly Variable[],
		kwargs: Kwargs,
	): Variable;
}
