import { BaseStatement } from "./BaseStatement";
import { FuncStatement } from "./FuncStatement";
import { VarStatement } from "./VarStatement";
import { SourceLocation } from "../../types/ast";

export interface TemplateStatement extends BaseStatement {
    kind: "TemplateStatement";
    name: string;
    fields: VarStatement[];
    methods: FuncStatement[];
}

export interface ClassStatement extends BaseStatement {
    kind: "ClassStatement";
    name: string;
    parent?: string;
    fields: VarStatement[];
    methods: FuncStatement[];
}

export interface EnumStatement extends BaseStatement {
    kind: "EnumStatement";
    name: string;
    cases: { name: string; loc: SourceLocation }[];
}
