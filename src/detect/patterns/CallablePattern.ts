import { annotationType, literalValue, typeOfLiteral } from "../../ast/PythonLiterals.js";
import { DocumentationExtractor } from "../../ast/extraction/DocumentationExtractor.js";
import { extractParameters, functionName, unwrapDefinition } from "../../ast/extraction/SignatureExtractor.js";
import { humanize } from "../../utils/Identifiers.js";
import type { CallableCandidate, ParameterDocument, ParsedModule } from "../types.js";

/**
 * Public top-level functions not owned by another pattern.
 */
export class CallablePattern {
    private readonly docs = new DocumentationExtractor();

    public match(module: ParsedModule, claimed: ReadonlySet<number>): CallableCandidate[] {
        const candidates: CallableCandidate[] = [];
        for (const node of module.root.namedChildren) {
            const definition = unwrapDefinition(node);
            const name = definition ? functionName(definition) : undefined;
            if (!definition || !name || name.startsWith("_") || claimed.has(definition.startIndex)) continue;

            const documentation = this.docs.extract(definition, node);
            const parameters: ParameterDocument[] = extractParameters(definition).map(formal => {
                const defaultValue = formal.defaultValue ? literalValue(formal.defaultValue) : undefined;
                const parameter: ParameterDocument = {
                    name: formal.name,
                    type: formal.annotation
                        ? annotationType(formal.annotation)
                        : typeOfLiteral(defaultValue) ?? "string",
                    description: documentation.parameters.get(formal.name) || humanize(formal.name),
                    required: formal.defaultValue === undefined
                };
                if (defaultValue !== undefined && defaultValue !== null) {
                    parameter.default = defaultValue;
                }
                return parameter;
            });

            candidates.push({
                kind: "python-module",
                relPath: module.file.relPath,
                functionName: name,
                tool: {
                    name,
                    description: documentation.summary ?? humanize(name),
                    function: name,
                    parameters
                }
            });
        }
        return candidates;
    }
}
