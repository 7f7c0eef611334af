import { BaseStatement } from "./BaseStatement";
import { InterpolationPart } from "../../types/expression";

export interface ShellStatement extends BaseStatement {
    kind: "ShellStatement";
    parts: InterpolationPart[];
}
