import { BaseStatement } from "./BaseStatement";

/**
 * `import "./util" as util` binds the module namespace,
 * `import { a, b as c } from "./util"` binds selected names.
 */
export interface ImportStatement extends BaseStatement {
    kind: "ImportStatement";
    moduleName: string;
    alias?: string;
    imports?: { name: string; alias?: string }[];
}
