// symtrace Host Runtime
// The live process state a trace is captured against

import { dictClass, moduleClass } from "./object-model.ts";
import type { HostClass, HostObject, LiveValue } from "./values.ts";
import { hostObject } from "./values.ts";

export interface HostRuntime {
	/** The process-global module registry (a live `dict`) */
	modules: HostObject;
	/** Base class of third-party record outputs; absent when not installed */
	recordOutputBase?: HostClass;
	/** Base class of pretrained configurations; absent when not installed */
	pretrainedConfigBase?: HostClass;
}

export interface HostRuntimeOptions {
	recordOutputBase?: HostClass;
	pretrainedConfigBase?: HostClass;
}

/** A live module object. */
export function hostModule(name: string): HostObject {
	return hostObject(moduleClass, [["__name__", name]]);
}

export function createHostRuntime(
	modules: Iterable<readonly [string, LiveValue]> = [],
	options: HostRuntimeOptions = {},
): HostRuntime {
	const runtime: HostRuntime = {
		modules: hostObject(dictClass, [], [...modules]),
	};
	if (options.recordOutputBase !== undefined) runtime.recordOutputBase = options.recordOutputBase;
	if (options.pretrainedConfigBase !== undefined) {
		runtime.pretrainedConfigBase = options.pretrainedConfigBase;
	}
	return runtime;
}
