// symtrace Tracer
// Live-variable table and collaborator services for one trace capture

import { wrapLiveValue } from "./builder.ts";
import { Codegen } from "./codegen.ts";
import type { TraceConfig, TraceConfigInput } from "./config.ts";
import { resolveConfig } from "./config.ts";
import type { TraceError } from "./errors.ts";
import { isTraceError, unimplemented } from "./errors.ts";
import type { HostRuntime } from "./host/runtime.ts";
import { createHostRuntime } from "./host/runtime.ts";
import type { HostFunction, HostNNModule, LiveValue } from "./host/values.ts";
import { isSkipped } from "./skipfiles.ts";
import type { Source } from "./source.ts";
import { substitute } from "./variables/base.ts";
import type { TraceContext } from "./variables/context.ts";
import { callMethod, getAttr } from "./variables/dispatch.ts";
import { callFunction } from "./variables/functions.ts";
import type { DictKey, Kwargs, UserFunctionVariable, Variable } from "./variables/types.ts";
import { NO_KWARGS } from "./variables/types.ts";

//==============================================================================
// Options
//==============================================================================

/**
 * Runs a user function body symbolically. Supplied by the bytecode
 * interpreter that drives the tracer.
 */
export type InlineExecutor = (
	tx: Tracer,
	fn: UserFunctionVariable,
	args: readonly Variable[],
	kwargs: Kwargs,
) => Variable;

export interface TracerOptions {
	config?: TraceConfigInput;
	host?: HostRuntime;
	inline?: InlineExecutor;
}

export type CaptureResult<T> =
	| { status: "committed"; value: T }
	| { status: "abandoned"; error: TraceError };

interface TracerSnapshot {
	stack: Variable[];
	locals: Map<string, Variable>;
	weakrefs: Map<string, DictKey>;
	nnModules: Map<string, HostNNModule>;
}

//==============================================================================
// Tracer
//==============================================================================

export class Tracer implements TraceContext {
	readonly config: TraceConfig;
	readonly host: HostRuntime;
	private readonly inline: InlineExecutor | undefined;

	private stack: Variable[] = [];
	private locals = new Map<string, Variable>();
	private weakrefs = new Map<string, DictKey>();
	private nnModules = new Map<string, HostNNModule>();

	constructor(options: TracerOptions = {}) {
		this.config = resolveConfig(options.config);
		this.host = options.host ?? createHostRuntime();
		this.inline = options.inline;
	}

	//--------------------------------------------------------------------------
	// Live variables
	//--------------------------------------------------------------------------

	push(v: Variable): void {
		this.stack.push(v);
	}

	pop(): Variable {
		const v = this.stack.pop();
		if (v === undefined) return unimplemented("pop from an empty stack");
		return v;
	}

	get stackDepth(): number {
		return this.stack.length;
	}

	peek(depth = 0): Variable | undefined {
		return this.stack[this.stack.length - 1 - depth];
	}

	setLocal(name: string, v: Variable): void {
		this.locals.set(name, v);
	}

	getLocal(name: string): Variable | undefined {
		return this.locals.get(name);
	}

	/**
	 * Substitute `newVar` for `oldVar` everywhere in live state, including
	 * inside containers that hold it.
	 */
	replaceAll(oldVar: Variable, newVar: Variable): Variable {
		this.stack = this.stack.map(v => substitute(v, oldVar, newVar));
		const locals = new Map<string, Variable>();
		for (const [name, v] of this.locals) locals.set(name, substitute(v, oldVar, newVar));
		this.locals = locals;
		return newVar;
	}

	//--------------------------------------------------------------------------
	// Registries
	//--------------------------------------------------------------------------

	storeGlobalWeakref(name: string, value: DictKey): void {
		if (!this.weakrefs.has(name)) this.weakrefs.set(name, value);
	}

	/** Weak-ref slots the compiled code must install, by global name */
	get globalWeakrefs(): ReadonlyMap<string, DictKey> {
		return this.weakrefs;
	}

	registerNNModule(module: HostNNModule): string {
		for (const [key, existing] of this.nnModules) {
			if (existing === module) return key;
		}
		let key = module.name;
		for (let i = 1; this.nnModules.has(key); i++) key = module.name + "_" + String(i);
		this.nnModules.set(key, module);
		return key;
	}

	lookupNNModule(key: string): HostNNModule | undefined {
		return this.nnModules.get(key);
	}

	//--------------------------------------------------------------------------
	// Collaborator entry points
	//--------------------------------------------------------------------------

	wrap(value: LiveValue, source?: Source): Variable {
		return wrapLiveValue(this, value, source);
	}

	inlineUserFunctionReturn(
		fn: UserFunctionVariable,
		args: readonly Variable[],
		kwargs: Kwargs,
	): Variable {
		if (this.inline === undefined) return unimplemented("inline call of " + fn.fn.name);
		if (this.config.trace) console.log("[Tracer] inlining " + fn.fn.name);
		return this.inline(this, fn, args, kwargs);
	}

	/**
	 * Frames of skipped functions run natively.
	 */
	shouldTraceFrame(fn: HostFunction): boolean {
		return !isSkipped(fn);
	}

	callMethod(self: Variable, name: string, args: readonly Variable[], kwargs: Kwargs = NO_KWARGS): Variable {
		return callMethod(this, self, name, args, kwargs);
	}

	callFunction(fn: Variable, args: readonly Variable[], kwargs: Kwargs = NO_KWARGS): Variable {
		return callFunction(this, fn, args, kwargs);
	}

	getAttr(self: Variable, name: string): Variable {
		return getAttr(this, self, name);
	}

	reconstruct(v: Variable): Codegen {
		const codegen = new Codegen();
		codegen.reconstruct(v);
		return codegen;
	}

	//--------------------------------------------------------------------------
	// Capture
	//--------------------------------------------------------------------------

	private snapshot(): TracerSnapshot {
		return {
			stack: [...this.stack],
			locals: new Map(this.locals),
			weakrefs: new Map(this.weakrefs),
			nnModules: new Map(this.nnModules),
		};
	}

	private restore(snapshot: TracerSnapshot): void {
		this.stack = snapshot.stack;
		this.locals = snapshot.locals;
		this.weakrefs = snapshot.weakrefs;
		this.nnModules = snapshot.nnModules;
	}

	/**
	 * Run one region. A `TraceError` abandons it and leaves the tracer as it
	 * was before the region began; any other error propagates.
	 */
	capture<T>(region: (tx: Tracer) => T): CaptureResult<T> {
		const saved = this.snapshot();
		try {
			return { status: "committed", value: region(this) };
		} catch (error) {
			if (!isTraceError(error)) throw error;
			this.restore(saved);
			if (this.config.trace) console.log("[Tracer] abandoned region: " + error.message);
			return { status: "abandoned", error };
		}
	}
}
