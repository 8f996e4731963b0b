import type { SyntaxNode } from "../ast/AstBackend.js";
import type { ConfigDocument, ParameterDocument, ToolDocument } from "../config/ConfigSchema.js";

export interface SourceFile {
    absPath: string;
    /** POSIX-style path relative to the project root. */
    relPath: string;
    content: string;
}

export interface ParsedModule {
    file: SourceFile;
    root: SyntaxNode;
}

interface CandidateBase {
    relPath: string;
    tool: ToolDocument;
}

export interface CommandLineCandidate extends CandidateBase {
    kind: "commandline";
}

export interface RouteCandidate extends CandidateBase {
    kind: "http";
}

export interface CallableCandidate extends CandidateBase {
    kind: "python-module";
    functionName: string;
}

export type ToolCandidate = CommandLineCandidate | RouteCandidate | CallableCandidate;

export interface PatternResult<T extends ToolCandidate> {
    candidates: T[];
    /** startIndex of every function_definition the pattern owns. */
    claimed: Set<number>;
}

export interface ServiceHints {
    framework: "flask" | "fastapi" | "unknown";
    port?: number;
}

export interface DetectionAttempt {
    strategy: string;
    outcome: "success" | "failed";
    error?: string;
}

export interface DetectionResult {
    configuration: ConfigDocument;
    strategy: string;
    attempts: DetectionAttempt[];
}

/** A pluggable way of turning a project root into a configuration document. */
export interface DetectionStrategy {
    readonly name: string;
    isAvailable(): boolean;
    detect(projectRoot: string): Promise<ConfigDocument>;
}

export type { ParameterDocument, ToolDocument };
