// symtrace Pretrained Config Variable
// Attribute-only view of a configuration object

import { unimplemented } from "../errors.ts";
import type { HostRuntime } from "../host/runtime.ts";
import { getAttr, hasAttr, isSubclass } from "../host/object-model.ts";
import type { HostClass, HostObject } from "../host/values.ts";
import { describeLive, isLiteral } from "../host/values.ts";
import { propagate } from "./base.ts";
import type { ConfigObjectVariable, Variable, VariableOptions } from "./types.ts";
import { constantVar, makeCommon } from "./types.ts";

export function isPretrainedConfigClass(host: HostRuntime, cls: HostClass): boolean {
	const base = host.pretrainedConfigBase;
	return base !== undefined && isSubclass(cls, base);
}

export const configObjectVar = (
	value: HostObject,
	options: VariableOptions = {},
): ConfigObjectVariable => ({
	...makeCommon(options),
	kind: "configObject",
	value,
});

/**
 * Attributes are read eagerly from the live object and must be literals.
 */
export function getConfigAttr(self: ConfigObjectVariable, name: string): Variable {
	const live = getAttr(self.value, name);
	if (live === undefined) return unimplemented("config has no attribute " + name);
	if (!isLiteral(live)) return unimplemented("config attribute " + name + " is " + describeLive(live));
	return constantVar(live);
}

export function hasConfigAttr(self: ConfigObjectVariable, name: string): Variable {
	return constantVar(hasAttr(self.value, name), propagate(self));
}
