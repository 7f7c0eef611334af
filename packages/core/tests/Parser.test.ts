import { YpshError } from "../src/utils/Error";
import { lines, parse } from "./helpers";

describe("Parser", () => {
    function parseError(input: string): YpshError {
        try {
            parse(input);
        } catch (e) {
            if (e instanceof YpshError) return e;
            throw e;
        }
        throw new Error("Expected a parse error");
    }

    test("declaration with scope and annotation", () => {
        const [stmt] = parse("global let x: int = 5").statements;
        expect(stmt).toMatchObject({
            kind: "VarStatement",
            name: "x",
            constant: true,
            scope: "global",
            annotation: "int",
            value: { type: "IntLiteral", value: 5 },
        });
    });

    test("operator precedence", () => {
        const [stmt] = parse("1 + 2 * 3").statements;
        expect(stmt).toMatchObject({
            kind: "ExpressionStatement",
            expression: {
                type: "BinaryExpression",
                operator: "+",
                left: { type: "IntLiteral", value: 1 },
                right: {
                    type: "BinaryExpression",
                    operator: "*",
                },
            },
        });
    });

    test("conditional expressions nest to the right", () => {
        const [stmt] = parse("a ? b : c ? d : e").statements;
        expect(stmt).toMatchObject({
            expression: {
                type: "TernaryExpression",
                condition: { varName: "a" },
                alternate: { type: "TernaryExpression" },
            },
        });
    });

    test("line breaks end statements", () => {
        expect(parse("var a = 1\nvar b = 2").statements).toHaveLength(2);
        expect(parse("var a = 1; var b = 2").statements).toHaveLength(2);
        expect(parseError("var a = 1 var b = 2").rawMessage).toBe(
            "Expected end of statement, found 'var'",
        );
    });

    test("line breaks inside brackets do not end statements", () => {
        const [stmt] = parse("var l = [\n1,\n2\n]").statements;
        expect(stmt).toMatchObject({
            value: { type: "ListLiteral", elements: [{ value: 1 }, { value: 2 }] },
        });
    });

    test("a call does not continue on the next line", () => {
        expect(parse("f\n(1)").statements).toHaveLength(2);
    });

    test("compound assignment to an attribute", () => {
        const [stmt] = parse("d.a += 5").statements;
        expect(stmt).toMatchObject({
            kind: "AssignmentStatement",
            operator: "+=",
            assignee: { type: "MemberExpression", property: "a" },
            value: { value: 5 },
        });
    });

    test("invalid assignment target", () => {
        expect(parseError("1 = 2").rawMessage).toBe(
            "Invalid assignment target, expected a name, attribute or index, found '='",
        );
    });

    test("function with defaults, annotations and keyword call", () => {
        const [fn, call] = parse(
            lines("func f(a: int, b = a + 1) -> int { return b }", "f(1, b = 2)"),
        ).statements;
        expect(fn).toMatchObject({
            kind: "FuncStatement",
            name: "f",
            params: [
                { name: "a", annotation: "int" },
                { name: "b", defaultValue: { type: "BinaryExpression" } },
            ],
            returnType: "int",
        });
        expect(call).toMatchObject({
            expression: {
                type: "CallExpression",
                arguments: [{ value: 1 }],
                keywordArguments: [{ name: "b", value: { value: 2 } }],
            },
        });
    });

    test("duplicate parameters", () => {
        expect(parseError("func f(a, a) { }").rawMessage).toBe(
            "Duplicate parameter 'a', found 'a'",
        );
    });

    test("positional argument after keyword argument", () => {
        expect(parseError("f(a = 1, 2)").rawMessage).toBe(
            "Positional argument after keyword argument, found '2'",
        );
    });

    test("elif chains nest as if statements", () => {
        const [stmt] = parse(
            "if a { x() } elif b { y() } else { z() }",
        ).statements;
        expect(stmt).toMatchObject({
            kind: "IfStatement",
            elseBranch: {
                kind: "IfStatement",
                condition: { varName: "b" },
                elseBranch: { kind: "BlockStatement" },
            },
        });
    });

    test("switch arms", () => {
        const [stmt] = parse(
            lines(
                "switch x {",
                "case 1, 2: print(1)",
                "default: print(0)",
                "}",
            ),
        ).statements;
        expect(stmt).toMatchObject({
            kind: "SwitchStatement",
            cases: [
                {
                    values: [{ value: 1 }, { value: 2 }],
                    body: { kind: "BlockStatement", statements: [{}] },
                },
            ],
            defaultCase: { kind: "BlockStatement" },
        });
    });

    test("control flow outside its construct", () => {
        expect(parseError("break").rawMessage).toBe(
            "'break' outside of a loop, found 'break'",
        );
        expect(parseError("return 1").rawMessage).toBe(
            "'return' outside of a function, found 'return'",
        );
        expect(
            parseError("while true { func f() { continue } }").rawMessage,
        ).toBe("'continue' outside of a loop, found 'continue'");
    });

    test("class with parent, fields and methods", () => {
        const [stmt] = parse(
            "class Dog: Animal { let legs = 4; func bark() { } }",
        ).statements;
        expect(stmt).toMatchObject({
            kind: "ClassStatement",
            name: "Dog",
            parent: "Animal",
            fields: [{ name: "legs", constant: true }],
            methods: [{ name: "bark" }],
        });
    });

    test("only declarations inside type bodies", () => {
        expect(parseError("template T { print(1) }").rawMessage).toBe(
            "Only 'var', 'let' and 'func' declarations are allowed in 'T', found 'print'",
        );
    });

    test("enum cases", () => {
        const [stmt] = parse("enum Color { case Red, Green; Blue }").statements;
        expect(stmt).toMatchObject({
            kind: "EnumStatement",
            cases: [{ name: "Red" }, { name: "Green" }, { name: "Blue" }],
        });
        expect(parseError("enum E { A, A }").rawMessage).toBe(
            "Duplicate enum case 'A', found 'A'",
        );
    });

    test("do/catch with and without a name", () => {
        const [named, bare] = parse(
            "do { } catch e { }\ndo { } catch { }",
        ).statements;
        expect(named).toMatchObject({ kind: "DoCatchStatement", errorName: "e" });
        expect(bare.kind).toBe("DoCatchStatement");
        expect(bare.kind === "DoCatchStatement" && bare.errorName).toBeUndefined();
    });

    test("imports", () => {
        const [whole, named] = parse(
            lines('import "./util" as u', 'import { a, b as c } from "./util"'),
        ).statements;
        expect(whole).toMatchObject({
            kind: "ImportStatement",
            moduleName: "./util",
            alias: "u",
        });
        expect(named).toMatchObject({
            imports: [{ name: "a" }, { name: "b", alias: "c" }],
        });
    });

    test("shell line parts are parsed as expressions", () => {
        const [stmt] = parse(String.raw`$ echo \(a + 1)`).statements;
        expect(stmt).toMatchObject({
            kind: "ShellStatement",
            parts: [
                { kind: "text", value: "echo " },
                {
                    kind: "expr",
                    expression: { type: "BinaryExpression", operator: "+" },
                },
            ],
        });
    });

    test("foreign expression with attributes", () => {
        const [stmt] = parse("var r = <js n={count}>return n</js>").statements;
        expect(stmt).toMatchObject({
            value: {
                type: "ForeignExpression",
                runtimeName: "js",
                attributes: { n: { type: "VarReference", varName: "count" } },
                code: "return n",
            },
        });
    });

    test("dictionary literals", () => {
        const [stmt] = parse('var d = {"a": 1, b: 2}').statements;
        expect(stmt).toMatchObject({
            value: {
                type: "DictLiteral",
                entries: [
                    { key: "a", value: { value: 1 } },
                    { key: "b", value: { value: 2 } },
                ],
            },
        });
    });

    test("errors point at the offending token", () => {
        const error = parseError("var = 1");
        expect(error.kind).toBe("ParseError");
        expect(error.rawMessage).toBe("Expected variable name, found '='");
        expect(error.loc).toMatchObject({ line: 1, col: 5 });
    });

    test("missing closing brace", () => {
        expect(parseError("func f() {").rawMessage).toBe(
            "Expected '}', found end of input",
        );
    });
});
