import { ContextValue } from '../entities/Frame';
import { ParameterDeclaration, ParameterType } from '../entities/TemplateParameter';

const TRUTHY_LITERALS = new Set(['true', '1', 'yes', 'on']);
const INTEGER_LITERAL = /^[+-]?\d+$/;

/**
 * Converts a placeholder's default literal into the value its type declares.
 * A missing literal yields the type's zero value.
 */
export function coerceDefaultValue(type: ParameterType, literal?: string): ParameterDeclaration['default'] {
    return createParameterDeclaration('', type, literal).default;
}

/**
 * Builds the schema entry for a placeholder.
 */
export function createParameterDeclaration(
    name: string,
    type: ParameterType,
    literal?: string
): ParameterDeclaration {
    switch (type) {
        case 'number':
            return { type, default: literal === undefined ? 0 : parseNumberLiteral(literal), label: name };
        case 'color':
            return { type, default: literal === undefined ? '#000000' : normalizeColor(literal), label: name };
        case 'bool':
            return { type, default: literal !== undefined && TRUTHY_LITERALS.has(literal.toLowerCase()), label: name };
        case 'text':
            return { type, default: literal ?? '', label: name };
    }
}

function normalizeColor(literal: string): string {
    return literal.startsWith('#') ? literal : `#${literal}`;
}

/**
 * Integer parse when the literal has no '.', float parse otherwise.
 * Unparsable literals fall back to 0.
 */
function parseNumberLiteral(literal: string): number {
    const trimmed = literal.trim();
    let parsed = NaN;

    if (!trimmed.includes('.')) {
        if (INTEGER_LITERAL.test(trimmed)) {
            parsed = parseInt(trimmed, 10);
        }
    } else {
        parsed = Number(trimmed);
    }

    if (!Number.isFinite(parsed)) {
        console.warn(`[TemplateParser] Invalid number value '${literal}', using 0`);
        return 0;
    }
    return parsed;
}

/**
 * Renders a context value as markup text. Booleans are written as the
 * lowercase words `true` / `false`.
 */
export function stringifyContextValue(value: ContextValue): string {
    if (value === null || value === undefined) {
        return '';
    }
    if (typeof value === 'boolean') {
        return value ? 'true' : 'false';
    }
    return String(value);
}
