// symtrace Configuration
// Zod schema and defaults for tracer options

import { z } from "zod/v4";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.ts";

//==============================================================================
// Schema
//==============================================================================

/** Method names a customized record class may override and still be traced. */
export const CustomDictHookSchema = z.enum([
	"__getitem__",
	"to_tuple",
	"__setitem__",
	"__setattr__",
]);

export type CustomDictHook = z.infer<typeof CustomDictHookSchema>;

export const TraceConfigSchema = z.object({
	/** Log every mapping method dispatch */
	trace: z.boolean().default(false),
	/** Warn when the module registry falls back to a full snapshot */
	warnOnSnapshotFallback: z.boolean().default(true),
	/** Module that hosts the third-party record-output classes */
	recordOutputModule: z.string().min(1).default("transformers.modeling_outputs"),
	/** Overrides inlined by customized record variables */
	customDictOverrideHooks: z
		.array(CustomDictHookSchema)
		.default(["__getitem__", "to_tuple", "__setitem__", "__setattr__"]),
});

export type TraceConfig = z.infer<typeof TraceConfigSchema>;
export type TraceConfigInput = z.input<typeof TraceConfigSchema>;

//==============================================================================
// Resolution
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

/**
 * Validate an untrusted configuration object.
 */
export function validateConfig(input: unknown): ValidationResult<TraceConfig> {
	const parsed = TraceConfigSchema.safeParse(input);
	if (!parsed.success) {
		return invalidResult<TraceConfig>(zodToValidationErrors(parsed.error));
	}
	return validResult(parsed.data);
}

/**
 * Fill in defaults for a partial configuration. Throws on invalid input.
 */
export function resolveConfig(input: TraceConfigInput = {}): TraceConfig {
	return TraceConfigSchema.parse(input);
}
