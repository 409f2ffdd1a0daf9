// symtrace Skip Registry
// Functions whose frames the tracer must run natively instead of tracing

import type { HostRuntime } from "./host/runtime.ts";
import type { HostFunction } from "./host/values.ts";
import { isHostFunction } from "./host/values.ts";

const skipped = new Set<number>();

// Set once the record-output base's methods have been registered
let recordBasePatched = false;

export function skipCode(fn: HostFunction): void {
	skipped.add(fn.id);
}

export function isSkipped(fn: HostFunction): boolean {
	return skipped.has(fn.id);
}

/**
 * Register every method of the record-output base as skipped code. Runs at
 * most once per process; a runtime without the base leaves the flag unset so
 * a later runtime that has it still gets patched.
 */
export function ensureRecordBasePatched(host: HostRuntime): void {
	if (recordBasePatched) return;
	const base = host.recordOutputBase;
	if (base === undefined) return;
	for (const attr of base.attrs.values()) {
		if (isHostFunction(attr)) skipCode(attr);
	}
	recordBasePatched = true;
}

export function isRecordBasePatched(): boolean {
	return recordBasePatched;
}
