// symtrace - Symbolic mapping variables for trace capture
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	ConfigObjectVariable, CustomizedDictVariable, DataClassVariable,
	DefaultDictVariable, DictEntry, DictItems, DictKey, DictVariable,
	GraphProxy, Kwargs, MappingVariable, MutableLocal, SequenceVariable,
	SysModulesVariable, Variable, VariableKind, VariableOptions,
} from "./variables/types.ts";

export type { TraceContext } from "./variables/context.ts";

export type { ErrorCode, ValidationError, ValidationResult } from "./errors.ts";

export type { CustomDictHook, TraceConfig, TraceConfigInput } from "./config.ts";

export type { Guard, GuardKind, GuardSet, MembershipGuard, SourceGuard } from "./guards.ts";

export type { Source } from "./source.ts";

export type {
	BuiltinName, FieldSpec, HostBuiltin, HostClass, HostFunction, HostList,
	HostNNModule, HostObject, HostTensor, HostTuple, Literal, LiveValue,
} from "./host/values.ts";

export type { HostRuntime, HostRuntimeOptions } from "./host/runtime.ts";

export type { AggregateKind, ConstOperand, Instruction, Opcode } from "./codegen.ts";

export type { CaptureResult, InlineExecutor, TracerOptions } from "./tracer.ts";

export type { LiveClassification } from "./builder.ts";

export type { ConstantValue, ProxyValue } from "./variables/dispatch.ts";

//==============================================================================
// Errors and Configuration
//==============================================================================

export {
	ErrorCodes, TraceError, exhaustive, invalidResult, isTraceError,
	unimplemented, validResult,
} from "./errors.ts";

export { CustomDictHookSchema, TraceConfigSchema, resolveConfig, validateConfig } from "./config.ts";

//==============================================================================
// Host Model
//==============================================================================

export {
	describeLive, hostBuiltin, hostFunction, hostList, hostNNModule, hostObject,
	hostTensor, hostTuple, isLiteral,
} from "./host/values.ts";

export {
	dataclassFields, defaultDictClass, defineClass, dictClass, field, fieldWithDefault,
	getAttr as getLiveAttr, hasAttr as hasLiveAttr, isDataclass, isSubclass,
	lookupAttr, moduleClass, mro, objectClass, orderedDictClass, qualifiedName,
} from "./host/object-model.ts";

export { createHostRuntime, hostModule } from "./host/runtime.ts";

//==============================================================================
// Guards and Provenance
//==============================================================================

export {
	addGuards, emptyGuards, guardSet, isSuperset, makeGuard, membershipGuard, unionGuards,
} from "./guards.ts";

export {
	attrSource, getItemSource, globalSource, globalWeakRefSource, localSource,
	moduleSource, sourceName,
} from "./source.ts";

//==============================================================================
// Variables
//==============================================================================

export {
	NO_KWARGS, builtinVar, constantVar, isMappingVariable, isSequenceVariable,
	listVar, moduleVar, newMutableLocal, nnModuleVar, proxy, setVar, tensorVar,
	tupleVar, userDefinedClassVar, userDefinedObjectVar, userFunctionVar,
} from "./variables/types.ts";

export { addOptions, propagate, substitute } from "./variables/base.ts";

export {
	describeKey, globalKeyName, isGlobalRefKey, isValidKey, keyHash, keyToVar, normalizeKey,
} from "./variables/keys.ts";

export { DICT_METHODS, callDictMethod, createDict, dictItems, parseDictMethod } from "./variables/dicts.ts";

export {
	createDefaultDict, isAllowlistedFactory, isDefaultDictConstant, isSupportedFactory,
} from "./variables/default-dict.ts";

export {
	bindArguments, createDataClass, isRecordOutputClass, recordIncludesNone, wrapDataClass,
} from "./variables/dataclass.ts";

export { createCustomizedDict, isMatchingCustomizedDictClass } from "./variables/customized-dict.ts";

export { SYS_MODULES_SOURCE, createSysModules } from "./variables/sys-modules.ts";

export { configObjectVar, isPretrainedConfigClass } from "./variables/config-object.ts";

export { callClass, callFunction } from "./variables/functions.ts";

export {
	asConstant, asProxy, callMethod, getAttr, hasAttr, isLiteralConstant, unpackVarSequence,
} from "./variables/dispatch.ts";

//==============================================================================
// Tracing
//==============================================================================

export { classifyLiveValue, wrapDictSnapshot, wrapLiveValue } from "./builder.ts";

export { Codegen } from "./codegen.ts";

export { ensureRecordBasePatched, isSkipped, skipCode } from "./skipfiles.ts";

export { Tracer } from "./tracer.ts";
