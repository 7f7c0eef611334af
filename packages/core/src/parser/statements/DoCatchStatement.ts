import { BaseStatement } from "./BaseStatement";
import { BlockStatement } from "./BlockStatement";

export interface DoCatchStatement extends BaseStatement {
    kind: "DoCatchStatement";
    body: BlockStatement;
    // Name the caught payload is bound to, `catch e { ... }`
    errorName?: string;
    handler: BlockStatement;
}
