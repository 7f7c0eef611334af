import { lines, runError, runOk } from "./helpers";

describe("Templates and classes", () => {
    const animals = lines(
        "template Animal {",
        '    var name = "animal"',
        '    var sound = "a sound"',
        '    func speak(self) { return self.name + " makes " + self.sound }',
        "}",
        "class Dog: Animal {",
        '    var sound = "barks"',
        "    func __init__(name) { self.name = name }",
        '    func bark() { return self.name + " barks" }',
        "}",
    );

    test("methods, inherited fields and the initializer", () => {
        const output = runOk(
            lines(
                animals,
                'var d = Dog("Rex")',
                "print(d.bark())",
                "print(d.speak())",
                "print(Animal.speak(d))",
                "print(type(d), d, d.bark)",
            ),
        );
        expect(output).toBe(
            lines(
                "Rex barks",
                "Rex makes barks",
                "Rex makes barks",
                "Dog <Dog instance> <method Dog.bark>",
                "",
            ),
        );
    });

    test("initializer takes keyword arguments", () => {
        expect(runOk(lines(animals, 'print(Dog(name = "Max").name)'))).toBe(
            "Max\n",
        );
    });

    test("classes extend classes", () => {
        const output = runOk(
            lines(
                "class Base {",
                "    var x = 1",
                "    func get() { return self.x }",
                "}",
                "class Child: Base {",
                "    func next() { return self.get() + 1 }",
                "}",
                "var c = Child()",
                "print(c.get(), c.next())",
                "var b: Base = c",
            ),
        );
        expect(output).toBe("1 2\n");
    });

    test("annotations check the class chain", () => {
        const error = runError(
            lines("class Base { }", "class Child: Base { }", "var s: Child = Base()"),
        );
        expect(error.kind).toBe("TypeError");
        expect(error.rawMessage).toBe("Variable 's' must be 'Child', got 'Base'");
    });

    test("templates cannot be instantiated", () => {
        const error = runError("template T { }\nT()");
        expect(error.kind).toBe("TypeError");
        expect(error.rawMessage).toBe("Cannot instantiate template 'T'");
        expect(error.hint).toBe("Declare a class based on it: class MyT: T { }");
    });

    test("constant fields", () => {
        const error = runError("class P { let id = 1 }\nvar p = P()\np.id = 2");
        expect(error.kind).toBe("ImmutableAssignmentError");
        expect(error.rawMessage).toBe("Cannot assign to constant field 'id'");
    });

    test("each instance gets fresh field values", () => {
        const output = runOk(
            lines(
                "class Box { var items = [] }",
                "var a = Box()",
                "var b = Box()",
                "append(a.items, 1)",
                "print(len(a.items), len(b.items))",
            ),
        );
        expect(output).toBe("1 0\n");
    });

    test("a class without an initializer takes no arguments", () => {
        const error = runError("class C { }\nC(1)");
        expect(error.kind).toBe("ArityError");
        expect(error.rawMessage).toBe("C() takes no arguments");
    });

    test("missing attributes", () => {
        const error = runError("class C { }\nvar c = C()\nprint(c.missing)");
        expect(error.kind).toBe("AttributeError");
        expect(error.rawMessage).toBe("'C' has no attribute 'missing'");
    });

    test("field annotations", () => {
        const error = runError('class C { var n: int = "x" }\nC()');
        expect(error.rawMessage).toBe("Field 'n' of C must be 'int', got 'str'");
    });

    test("parent must exist and be a type", () => {
        const missing = runError("class C: Nope { }");
        expect(missing.kind).toBe("NameError");
        expect(missing.rawMessage).toBe(
            "Parent 'Nope' of class 'C' is not defined",
        );

        const notType = runError("var x = 1\nclass C: x { }");
        expect(notType.rawMessage).toBe(
            "Class 'C' cannot extend 'int', expected a template or class",
        );
    });
});

describe("Enums", () => {
    const color = "enum Color { case Red, Green; case Blue }";

    test("members compare by identity and expose name and ordinal", () => {
        const output = runOk(
            lines(
                color,
                "var c = Color.Blue",
                'print(c == Color.Blue, c == Color.Red, c == "Blue")',
                "print(c, c.name, c.ordinal, type(c))",
            ),
        );
        expect(output).toBe("true false false\nColor.Blue Blue 2 Color\n");
    });

    test("members of different enums are never equal", () => {
        const output = runOk(
            lines(
                "enum Left { case X, Y }",
                "enum Right { case X, Y }",
                "print(Left.X == Right.X, Left.X != Right.X, Left.X.ordinal == Right.X.ordinal)",
            ),
        );
        expect(output).toBe("false true true\n");
    });

    test("switch over members", () => {
        const output = runOk(
            lines(
                color,
                "var c = Color.Green",
                "switch c {",
                'case Color.Red: print("stop")',
                'case Color.Green: print("go")',
                "}",
            ),
        );
        expect(output).toBe("go\n");
    });

    test("enum annotations", () => {
        const error = runError(lines(color, "func paint(c: Color) { }", "paint(1)"));
        expect(error.rawMessage).toBe(
            "Argument 'c' of paint() must be 'Color', got 'int'",
        );
    });

    test("unknown member", () => {
        const error = runError(lines(color, "var p = Color.Pink"));
        expect(error.kind).toBe("AttributeError");
        expect(error.rawMessage).toBe("'enum' has no attribute 'Pink'");
    });
});
