// symtrace Provenance
// Describes how a value was reached from a trace root

import type { Literal } from "./host/values.ts";

export type Source =
	| LocalSource
	| GlobalSource
	| AttrSource
	| GetItemSource
	| GlobalWeakRefSource
	| ModuleSource;

export interface LocalSource {
	kind: "local";
	name: string;
}

export interface GlobalSource {
	kind: "global";
	name: string;
}

export interface AttrSource {
	kind: "attr";
	base: Source;
	member: string;
}

export interface GetItemSource {
	kind: "getItem";
	base: Source;
	/** Literal index, or the weak-ref name of an identity key */
	index: Literal;
	indexIsGlobalRef: boolean;
}

export interface GlobalWeakRefSource {
	kind: "globalWeakRef";
	name: string;
}

export interface ModuleSource {
	kind: "module";
	module: string;
}

//==============================================================================
// Constructors
//==============================================================================

export const localSource = (name: string): LocalSource => ({ kind: "local", name });
export const globalSource = (name: string): GlobalSource => ({ kind: "global", name });
export const attrSource = (base: Source, member: string): AttrSource => ({
	kind: "attr",
	base,
	member,
});
export const getItemSource = (
	base: Source,
	index: Literal,
	indexIsGlobalRef = false,
): GetItemSource => ({ kind: "getItem", base, index, indexIsGlobalRef });
export const globalWeakRefSource = (name: string): GlobalWeakRefSource => ({
	kind: "globalWeakRef",
	name,
});
export const moduleSource = (module: string): ModuleSource => ({
	kind: "module",
	module,
});

/**
 * Render a source the way guard failure messages print it, e.g. `L['x'].y`.
 */
export function sourceName(source: Source): string {
	switch (source.kind) {
	case "local":
		return "L[" + JSON.stringify(source.name) + "]";
	case "global":
		return "G[" + JSON.stringify(source.name) + "]";
	case "attr":
		return sourceName(source.base) + "." + source.member;
	case "getItem":
		return (
			sourceName(source.base) +
			"[" +
			(source.indexIsGlobalRef ? "G[" + String(source.index) + "]()" : JSON.stringify(source.index)) +
			"]"
		);
	case "globalWeakRef":
		return "G[" + JSON.stringify(source.name) + "]()";
	case "module":
		return "__import__(" + JSON.stringify(source.module) + ")";
	}
}
