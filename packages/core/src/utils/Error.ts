import chalk from "chalk";

import type { Value } from "../values/Value";

export type ErrorKind =
    | "LexError"
    | "ParseError"
    | "NameError"
    | "ImmutableAssignmentError"
    | "TypeError"
    | "ValueError"
    | "ArityError"
    | "IndexError"
    | "KeyError"
    | "ZeroDivisionError"
    | "AttributeError"
    | "ShellCommandError"
    | "ForeignExecutionError"
    | "ImportError"
    | "ControlFlowError"
    | "Error";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
    endLine?: number;
    endCol?: number;
}

export interface ErrorOptions {
    source?: string;
    file?: string;
    hint?: string;
    payload?: Value;
    exitCode?: number;
}

export class YpshError extends Error {
    public kind: ErrorKind;
    public rawMessage: string;
    public loc?: ErrorLocation;
    public source?: string;
    public file?: string;
    public hint?: string;
    /** Value a `do/catch` handler receives instead of the generated dict. */
    public payload?: Value;
    /** Exit status of a failed shell command. */
    public exitCode?: number;

    constructor(
        kind: ErrorKind,
        message: string,
        loc?: ErrorLocation,
        options: ErrorOptions = {},
    ) {
        super(message);
        this.name = kind;
        this.kind = kind;
        this.rawMessage = message;
        this.loc = loc;
        this.source = options.source;
        this.file = options.file;
        this.hint = options.hint;
        this.payload = options.payload;
        this.exitCode = options.exitCode;
    }

    /**
     * Fills in location and source if the error was raised somewhere that
     * did not know them (native functions, containers).
     */
    public attach(
        loc: ErrorLocation | undefined,
        source: string,
        file?: string,
    ): this {
        if (!this.loc && loc) this.loc = loc;
        if (this.source === undefined) this.source = source;
        if (this.file === undefined) this.file = file;
        return this;
    }

    /**
     * Renders the error as a code frame:
     *
     *     Error: [Message]
     *        --> line [line]:[col]
     *         |
     *     10  | var x = 10 / 0
     *         |         ^^^^^^
     *         |
     *         = [Hint]
     */
    public format(): string {
        const header = `${chalk.red.bold(`${this.kind}:`)} ${chalk.bold(this.rawMessage)}`;
        if (!this.loc) return header;

        const loc = this.loc;
        const lineNumStr = String(loc.line);
        const padding = " ".repeat(lineNumStr.length);
        const where = this.file
            ? `${this.file}:${loc.line}:${loc.col}`
            : `line ${loc.line}:${loc.col}`;

        const output = [
            header,
            `${chalk.blue(padding)} ${chalk.blue("-->")} ${where}`,
        ];

        if (this.source) {
            const lineContent = this.source.split("\n")[loc.line - 1] ?? "";
            const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
            const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
            const underlineLen = Math.max(1, loc.len ?? 1);
            const pointer = chalk.red.bold("^".repeat(underlineLen));

            output.push(
                pipeLine,
                `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`,
                `${pipeLine} ${pointerSpace}${pointer}`,
                pipeLine,
            );
        }

        if (this.hint) {
            output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${this.hint}`);
        }

        return output.join("\n");
    }
}
