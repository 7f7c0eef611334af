import { Lexer } from "./lexer/Lexer";
import { Parser } from "./parser/Parser";
import { Interpreter, InterpreterOptions } from "./interpreter/Interpreter";
import { AST } from "./types/ast";
import { ErrorKind, ErrorLocation, YpshError } from "./utils/Error";
import { processOutput } from "./utils/output";

export { Lexer } from "./lexer/Lexer";
export { Parser } from "./parser/Parser";
export { TokenType } from "./lexer/TokenType";
export type { Token, TokenPart } from "./lexer/Token";
export type { AST, ASTNode, SourceLocation, TypeAnnotation } from "./types/ast";
export * from "./types/expression";
export * from "./parser/statements";
export { Interpreter } from "./interpreter/Interpreter";
export type {
    InterpreterOptions,
    ModuleLoader,
    ModuleRegistry,
} from "./interpreter/Interpreter";
export { Environment } from "./interpreter/Environment";
export type { Completion } from "./interpreter/Completion";
export { Repl, startRepl, needsMoreInput } from "./interpreter/Repl";
export * from "./values/Value";
export { unify } from "./library/utils/unify";
export { BUILTIN_NAMES } from "./library/builtins";
export { Orchestrator } from "./orchestrator/Orchestrator";
export type { OrchestratorOptions } from "./orchestrator/Orchestrator";
export * from "./orchestrator/Config";
export * from "./orchestrator/container/IRuntimeContainer";
export { BashContainer } from "./orchestrator/container/BashContainer";
export type { Spawner, SpawnResult } from "./orchestrator/container/BashContainer";
export { NodejsContainer } from "./orchestrator/container/NodejsContainer";
export * from "./scanner/Scanner";
export { YpshError } from "./utils/Error";
export type { ErrorKind, ErrorLocation } from "./utils/Error";
export type { OutputSink } from "./utils/output";

export type ExitOutcome =
    | { ok: true }
    | {
          ok: false;
          exitCode: number;
          kind: ErrorKind;
          message: string;
          loc?: ErrorLocation;
      };

/** Lex or parse failure, nothing ran. */
export const EXIT_PARSE_ERROR = 2;
/** Uncaught runtime error. */
export const EXIT_RUNTIME_ERROR = 1;
/** `return`, `break` or `continue` reached the top level. */
export const EXIT_CONTROL_FLOW = 3;

function failure(error: YpshError, exitCode: number): ExitOutcome {
    return {
        ok: false,
        exitCode,
        kind: error.kind,
        message: error.rawMessage,
        loc: error.loc,
    };
}

/**
 * Runs a whole program. Errors are printed as code frames to the error
 * stream of `options.output`.
 */
export function run(
    source: string,
    filename: string = "<main>",
    options: Omit<InterpreterOptions, "file"> = {},
): ExitOutcome {
    const output = options.output ?? processOutput;
    const report = (error: YpshError) => output.error(error.format() + "\n");

    let ast: AST;
    try {
        ast = new Parser(new Lexer(source).tokenize(), source).parse();
    } catch (e) {
        if (!(e instanceof YpshError)) throw e;
        report(e.attach(undefined, source, filename));
        return failure(e, EXIT_PARSE_ERROR);
    }

    const interpreter = new Interpreter({ ...options, file: filename });
    const completion = interpreter.run(ast, source);

    switch (completion.kind) {
        case "normal":
            return { ok: true };
        case "error":
            report(completion.error);
            return failure(completion.error, EXIT_RUNTIME_ERROR);
        default: {
            const error = new YpshError(
                "ControlFlowError",
                `'${completion.kind}' outside of ${completion.kind === "return" ? "a function" : "a loop"}`,
            );
            report(error);
            return failure(error, EXIT_CONTROL_FLOW);
        }
    }
}
