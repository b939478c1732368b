import {
    isParameterType,
    ParameterType,
    RESERVED_PARAMETER_NAMES,
    TemplateParameters,
} from '../entities/TemplateParameter';
import { createParameterDeclaration } from './ValueCoercer';

/**
 * `{{name}}`, `{{name=default}}`, `{{name:type}}`, `{{name:type=default}}`.
 * Existing templates depend on this exact grammar.
 */
const PLACEHOLDER_SOURCE = '\\{\\{([a-zA-Z_][a-zA-Z0-9_]*)(?::([a-z]+))?(?:=([^}]+))?\\}\\}';

export interface PlaceholderMatch {
    /** Full matched text, braces included */
    raw: string;
    name: string;
    /** Type token as written, undefined when omitted */
    type?: string;
    /** Default literal as written, undefined when omitted */
    defaultLiteral?: string;
}

/**
 * A fresh global regex per call, so callers never share `lastIndex`.
 */
export function createPlaceholderPattern(): RegExp {
    return new RegExp(PLACEHOLDER_SOURCE, 'g');
}

/**
 * All placeholder occurrences in document order, repeats included.
 */
export function findPlaceholders(body: string): PlaceholderMatch[] {
    const matches: PlaceholderMatch[] = [];
    for (const match of body.matchAll(createPlaceholderPattern())) {
        matches.push({ raw: match[0], name: match[1], type: match[2], defaultLiteral: match[3] });
    }
    return matches;
}

/**
 * Extracts the parameter schema of a template.
 *
 * Only the first occurrence of a name declares its type and default, so an
 * author can define `{{accent:color=ff0000}}` once and reuse `{{accent}}`
 * elsewhere. Reserved names are filled by the pipeline and skipped.
 */
export function parseTemplateParameters(body: string): TemplateParameters {
    const parameters: TemplateParameters = {};

    for (const placeholder of findPlaceholders(body)) {
        const { name } = placeholder;
        if (RESERVED_PARAMETER_NAMES.has(name) || Object.prototype.hasOwnProperty.call(parameters, name)) {
            continue;
        }

        let type: ParameterType = 'text';
        if (placeholder.type !== undefined) {
            if (isParameterType(placeholder.type)) {
                type = placeholder.type;
            } else {
                console.warn(`[TemplateParser] Unknown parameter type '${placeholder.type}' for '${name}', defaulting to 'text'`);
            }
        }

        // defineProperty keeps names such as __proto__ as plain own keys
        Object.defineProperty(parameters, name, {
            value: createParameterDeclaration(name, type, placeholder.defaultLiteral),
            enumerable: true,
            writable: true,
            configurable: true,
        });
    }

    const names = Object.keys(parameters);
    if (names.length > 0) {
        console.log(`[TemplateParser] Parsed ${names.length} custom parameter(s): ${names.join(', ')}`);
    }

    return parameters;
}
