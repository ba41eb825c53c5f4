import { Loc } from "./ast";

export enum TokenType {
    // Keywords
    And = "And", // and
    Class = "Class", // class
    Else = "Else", // else
    False = "False", // false
    Fn = "Fn", // fn
    For = "For", // for
    If = "If", // if
    Let = "Let", // let
    Nil = "Nil", // nil
    Or = "Or", // or
    Print = "Print", // print
    Return = "Return", // return
    Super = "Super", // super
    This = "This", // this
    True = "True", // true
    While = "While", // while

    // Identifiers
    Identifier = "Identifier",

    // Symbols
    LBrace = "LBrace", // {
    RBrace = "RBrace", // }
    LParen = "LParen", // (
    RParen = "RParen", // )
    Dot = "Dot", // .
    Comma = "Comma", // ,
    Semicolon = "Semicolon", // ;

    // Math Operators
    PlusOp = "PlusOp", // +
    MinusOp = "MinusOp", // -
    DivideOp = "DivideOp", // /
    ModuloOp = "ModuloOp", // %
    MultiplyOp = "MultiplyOp", // *

    // Assignment, Logical & Comparison
    Equals = "Equals", // =
    Equal = "Equal", // ==
    NotEqual = "NotEqual", // !=
    Greater = "Greater", // >
    Less = "Less", // <
    GreaterEqual = "GreaterEqual", // >=
    LessEqual = "LessEqual", // <=
    Bang = "Bang", // !

    // Literals
    StringLiteral = "StringLiteral", // "string"
    NumberLiteral = "NumberLiteral", // 12.345

    // End of file
    EOF = "EOF",
}

/**
 * `value` is the token's source text, except for strings, where it holds the
 * unescaped contents without quotes.
 */
export type Token = {
    type: TokenType;

    value: string;
} & Loc;

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
    ["and", TokenType.And],
    ["class", TokenType.Class],
    ["else", TokenType.Else],
    ["false", TokenType.False],
    ["fn", TokenType.Fn],
    ["for", TokenType.For],
    ["if", TokenType.If],
    ["let", TokenType.Let],
    ["nil", TokenType.Nil],
    ["or", TokenType.Or],
    ["print", TokenType.Print],
    ["return", TokenType.Return],
    ["super", TokenType.Super],
    ["this", TokenType.This],
    ["true", TokenType.True],
    ["while", TokenType.While],
]);

// Tokens that can begin a declaration or statement, used to resynchronize after a parse error
export const STATEMENT_STARTS: TokenType[] = [
    TokenType.Class,
    TokenType.Fn,
    TokenType.Let,
    TokenType.For,
    TokenType.If,
    TokenType.While,
    TokenType.Print,
    TokenType.Return,
];
