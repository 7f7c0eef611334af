export enum TokenType {
    // Keywords
    Var = "Var", // var
    Let = "Let", // let
    Global = "Global", // global
    Local = "Local", // local
    Func = "Func", // func
    Return = "Return", // return
    If = "If", // if
    Elif = "Elif", // elif
    Else = "Else", // else
    Switch = "Switch", // switch
    Case = "Case", // case
    Default = "Default", // default
    For = "For", // for
    In = "In", // in
    While = "While", // while
    Break = "Break", // break
    Continue = "Continue", // continue
    Template = "Template", // template
    Class = "Class", // class
    Enum = "Enum", // enum
    Do = "Do", // do
    Catch = "Catch", // catch
    Import = "Import", // import
    From = "From", // from
    As = "As", // as

    // Identifiers
    Identifier = "Identifier",

    // Operators & Symbols
    Equals = "Equals", // =
    PlusEquals = "PlusEquals", // +=
    MinusEquals = "MinusEquals", // -=
    MultiplyEquals = "MultiplyEquals", // *=
    DivideEquals = "DivideEquals", // /=
    ModuloEquals = "ModuloEquals", // %=
    LBrace = "LBrace", // {
    RBrace = "RBrace", // }
    LBracket = "LBracket", // [
    RBracket = "RBracket", // ]
    LParen = "LParen", // (
    RParen = "RParen", // )
    Arrow = "Arrow", // ->
    Colon = "Colon", // :
    Question = "Question", // ?
    Dot = "Dot", // .
    Comma = "Comma", // ,
    Semicolon = "Semicolon", // ;

    // Math Operators
    PlusOp = "PlusOp", // +
    MinusOp = "MinusOp", // -
    DivideOp = "DivideOp", // /
    ModuloOp = "ModuloOp", // %
    MultiplyOp = "MultiplyOp", // *

    // Logical & Comparison
    Equal = "Equal", // ==
    NotEqual = "NotEqual", // !=
    Greater = "Greater", // >
    Less = "Less", // <
    GreaterEqual = "GreaterEqual", // >=
    LessEqual = "LessEqual", // <=
    And = "And", // &&
    Or = "Or", // ||
    Bang = "Bang", // !

    // Literals
    StringLiteral = "StringLiteral", // "string"
    InterpolatedString = "InterpolatedString", // "a \(b) c"
    IntLiteral = "IntLiteral", // 12345
    FloatLiteral = "FloatLiteral", // 12.345
    BoolLiteral = "BoolLiteral", // true
    NoneLiteral = "NoneLiteral", // none

    // Special
    ShellCommand = "ShellCommand", // $ echo hi
    ForeignOpen = "ForeignOpen", // < (start of <js ...> header)
    ForeignClose = "ForeignClose", // > (end of <js ...> header)
    ForeignBody = "ForeignBody", // The raw code inside <js>...</js>
    ForeignEnd = "ForeignEnd", // </js>

    // End of file
    EOF = "EOF",
}
