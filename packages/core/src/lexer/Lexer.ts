import { KEYWORDS, Token, TokenType } from "../types/token";
import { makeError, RiftError } from "../utils/Error";

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
    "(": TokenType.LParen,
    ")": TokenType.RParen,
    "{": TokenType.LBrace,
    "}": TokenType.RBrace,
    ",": TokenType.Comma,
    ".": TokenType.Dot,
    "-": TokenType.MinusOp,
    "+": TokenType.PlusOp,
    ";": TokenType.Semicolon,
    "*": TokenType.MultiplyOp,
    "%": TokenType.ModuloOp,
};

// Operators that may be followed by '=' to form a two-char operator
const EQUALS_PAIRS: Record<string, [TokenType, TokenType]> = {
    "!": [TokenType.Bang, TokenType.NotEqual],
    "=": [TokenType.Equals, TokenType.Equal],
    "<": [TokenType.Less, TokenType.LessEqual],
    ">": [TokenType.Greater, TokenType.GreaterEqual],
};

const ESCAPES: Record<string, string> = {
    n: "\n",
    t: "\t",
    "\\": "\\",
    '"': '"',
};

export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;

    public errors: RiftError[] = [];
    /** Set when the input ended inside a token (an open string). */
    public incomplete: boolean = false;

    constructor(input: string) {
        this.input = input;
    }

    public tokenize(): Token[] {
        const tokens: Token[] = [];

        while (this.position < this.input.length) {
            const char = this.currentChar();

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            if (char === "/" && this.peekChar() === "/") {
                this.skipComment();
                continue;
            }

            if (char === "/") {
                tokens.push(this.createToken(TokenType.DivideOp, "/"));
                this.advance();
                continue;
            }

            const single = SINGLE_CHAR_TOKENS[char];
            if (single !== undefined) {
                tokens.push(this.createToken(single, char));
                this.advance();
                continue;
            }

            const pair = EQUALS_PAIRS[char];
            if (pair !== undefined) {
                if (this.peekChar() === "=") {
                    tokens.push(this.createToken(pair[1], char + "="));
                    this.advance();
                } else {
                    tokens.push(this.createToken(pair[0], char));
                }
                this.advance();
                continue;
            }

            if (char === '"') {
                const token = this.readString();
                if (token) tokens.push(token);
                continue;
            }

            if (this.isAlpha(char)) {
                tokens.push(this.readIdentifier());
                continue;
            }

            if (this.isDigit(char)) {
                tokens.push(this.readNumber());
                continue;
            }

            this.errors.push(
                makeError(
                    "lex",
                    this.input,
                    { line: this.line, col: this.col },
                    `Unexpected character '${char}'`,
                ),
            );
            this.advance();
        }

        tokens.push(this.createToken(TokenType.EOF, ""));
        return tokens;
    }

    private createToken(type: TokenType, value: string): Token {
        return { type, value, line: this.line, col: this.col };
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            value += ".";
            this.advance(); // consume dot

            while (
                this.position < this.input.length &&
                this.isDigit(this.currentChar())
            ) {
                value += this.currentChar();
                this.advance();
            }
        }

        return {
            type: TokenType.NumberLiteral,
            value,
            line: startLine,
            col: startCol,
            length: value.length,
        };
    }

    private readString(): Token | null {
        const startLine = this.line;
        const startCol = this.col;
        const startPosition = this.position;
        this.advance(); // skip quote

        let value = "";
        while (
            this.position < this.input.length &&
            this.currentChar() !== '"'
        ) {
            if (this.currentChar() === "\\") {
                this.advance();
                if (this.position >= this.input.length) break;
                const escaped = this.currentChar();
                value += ESCAPES[escaped] ?? "\\" + escaped;
                this.advance();
                continue;
            }
            value += this.currentChar();
            this.advance();
        }

        if (this.position >= this.input.length) {
            this.incomplete = true;
            this.errors.push(
                makeError(
                    "lex",
                    this.input,
                    { line: startLine, col: startCol },
                    "Unterminated string",
                ),
            );
            return null;
        }
        this.advance(); // skip close quote

        return {
            type: TokenType.StringLiteral,
            value,
            line: startLine,
            col: startCol,
            length: this.position - startPosition,
        };
    }

    private readIdentifier(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        const type = KEYWORDS.get(value) ?? TokenType.Identifier;
        return { type, value, line: startLine, col: startCol };
    }

    private skipComment() {
        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }
    }
}
