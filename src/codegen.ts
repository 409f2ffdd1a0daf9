// symtrace Codegen
// Instruction buffer that rebuilds runtime values from symbolic variables

import { exhaustive, unimplemented } from "./errors.ts";
import type { HostClass, Literal } from "./host/values.ts";
import type { Source } from "./source.ts";
import { reconstructDataClass } from "./variables/dataclass.ts";
import { reconstructCustomizedDict } from "./variables/customized-dict.ts";
import { reconstructDefaultDict } from "./variables/default-dict.ts";
import { reconstructDict } from "./variables/dicts.ts";
import { reconstructSysModules } from "./variables/sys-modules.ts";
import type { Variable } from "./variables/types.ts";

//==============================================================================
// Instruction Domain
//==============================================================================

/** Constant operand: a literal, a class object, or a tuple of keyword names. */
export type ConstOperand = Literal | HostClass | readonly string[];

export type AggregateKind = "map" | "tuple" | "list" | "set";

export type Instruction =
	| { op: "LOAD_CONST"; value: ConstOperand }
	| { op: "LOAD_GLOBAL"; name: string }
	| { op: "LOAD_FAST"; name: string }
	| { op: "LOAD_ATTR"; name: string }
	| { op: "IMPORT_NAME"; name: string }
	| { op: "BINARY_SUBSCR" }
	| { op: "CALL_FUNCTION"; argc: number }
	| { op: "CALL_FUNCTION_KW"; argc: number }
	| { op: "BUILD_MAP"; count: number }
	| { op: "BUILD_TUPLE"; count: number }
	| { op: "BUILD_LIST"; count: number }
	| { op: "BUILD_SET"; count: number }
	| { op: "LOAD_GRAPH_OUTPUT"; name: string };

export type Opcode = Instruction["op"];

const BUILD_OPS = {
	map: "BUILD_MAP",
	tuple: "BUILD_TUPLE",
	list: "BUILD_LIST",
	set: "BUILD_SET",
} as const;

//==============================================================================
// Codegen
//==============================================================================

export class Codegen {
	readonly instructions: Instruction[] = [];
	/** Globals the emitted code expects to be installed (weak-ref slots) */
	readonly declaredGlobals = new Set<string>();

	appendInstruction(instruction: Instruction): void {
		this.instructions.push(instruction);
	}

	loadConst(value: ConstOperand): void {
		this.appendInstruction({ op: "LOAD_CONST", value });
	}

	loadGlobal(name: string, declare = false): void {
		if (declare) this.declaredGlobals.add(name);
		this.appendInstruction({ op: "LOAD_GLOBAL", name });
	}

	loadAttr(name: string): void {
		this.appendInstruction({ op: "LOAD_ATTR", name });
	}

	loadModule(name: string): void {
		this.appendInstruction({ op: "IMPORT_NAME", name });
	}

	callFunction(argc: number): void {
		this.appendInstruction({ op: "CALL_FUNCTION", argc });
	}

	/**
	 * Call with the last `names.length` arguments bound by keyword.
	 */
	callFunctionKw(argc: number, names: readonly string[]): void {
		this.loadConst(names);
		this.appendInstruction({ op: "CALL_FUNCTION_KW", argc });
	}

	buildAggregate(kind: AggregateKind, count: number): void {
		this.appendInstruction({ op: BUILD_OPS[kind], count });
	}

	/**
	 * Emit the loads that re-derive a value from its provenance.
	 */
	loadSource(source: Source): void {
		switch (source.kind) {
		case "local":
			this.appendInstruction({ op: "LOAD_FAST", name: source.name });
			return;
		case "global":
			this.loadGlobal(source.name);
			return;
		case "attr":
			this.loadSource(source.base);
			this.loadAttr(source.member);
			return;
		case "getItem":
			this.loadSource(source.base);
			if (source.indexIsGlobalRef) {
				this.loadGlobal(String(source.index), true);
				this.callFunction(0);
			} else {
				this.loadConst(source.index);
			}
			this.appendInstruction({ op: "BINARY_SUBSCR" });
			return;
		case "globalWeakRef":
			this.loadGlobal(source.name, true);
			this.callFunction(0);
			return;
		case "module":
			this.loadModule(source.module);
			return;
		default:
			exhaustive(source);
		}
	}

	/**
	 * Emit instructions that leave a value equivalent to `v` on the stack.
	 * Mappings and sequences are always rebuilt from their items so that
	 * traced mutations are reflected; opaque values load from their source.
	 */
	reconstruct(v: Variable): void {
		switch (v.kind) {
		case "constant":
			this.loadConst(v.value);
			return;
		case "tensor":
			this.appendInstruction({ op: "LOAD_GRAPH_OUTPUT", name: v.proxy.name });
			return;
		case "tuple":
		case "list":
		case "set":
			for (const item of v.items) this.reconstruct(item);
			this.buildAggregate(v.kind, v.items.length);
			return;
		case "builtin":
			this.loadGlobal(v.fn);
			return;
		case "dict":
			reconstructDict(this, v);
			return;
		case "defaultDict":
			reconstructDefaultDict(this, v);
			return;
		case "dataClass":
			reconstructDataClass(this, v);
			return;
		case "customizedDict":
			reconstructCustomizedDict(this, v);
			return;
		case "sysModules":
			reconstructSysModules(this);
			return;
		case "userDefinedClass":
			if (v.source === undefined) {
				this.loadConst(v.value);
				return;
			}
			this.loadSource(v.source);
			return;
		case "nnModule":
		case "userFunction":
		case "module":
		case "userDefinedObject":
		case "configObject":
			if (v.source === undefined) {
				unimplemented("reconstruct " + v.kind + " without a source");
			}
			this.loadSource(v.source);
			return;
		default:
			exhaustive(v);
		}
	}
}
