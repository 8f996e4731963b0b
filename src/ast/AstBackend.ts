import type Parser from "web-tree-sitter";

export type SyntaxNode = Parser.SyntaxNode;

export interface AstDocument {
    rootNode: SyntaxNode;
    languageId: string;
    dispose: () => void;
}

export interface AstBackend {
    name: string;

    initialize(): Promise<void>;

    parseFile(absPath: string, content: string, languageHint?: string): Promise<AstDocument>;
}
