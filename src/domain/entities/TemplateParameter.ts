/**
 * Placeholder types a template author can declare with `{{name:type}}`.
 */
export const PARAMETER_TYPES = ['text', 'number', 'color', 'bool'] as const;

export type ParameterType = typeof PARAMETER_TYPES[number];

interface ParameterBase {
    /** Display label for generated UI controls (same as the name) */
    label: string;
}

export interface TextParameter extends ParameterBase {
    type: 'text';
    default: string;
}

export interface NumberParameter extends ParameterBase {
    type: 'number';
    default: number;
}

export interface ColorParameter extends ParameterBase {
    type: 'color';
    default: string;
}

export interface BoolParameter extends ParameterBase {
    type: 'bool';
    default: boolean;
}

export type ParameterDeclaration =
    | TextParameter
    | NumberParameter
    | ColorParameter
    | BoolParameter;

/**
 * Declared parameters keyed by name, in order of first occurrence.
 */
export type TemplateParameters = Record<string, ParameterDeclaration>;

/**
 * Names filled by the render pipeline itself. They never show up in a
 * template's parameter schema.
 */
export const RESERVED_PARAMETER_NAMES: ReadonlySet<string> = new Set([
    'title',
    'text',
    'image',
    'content_title',
    'content_author',
    'content_subtitle',
    'content_genre',
]);

export function isParameterType(value: string): value is ParameterType {
    return PARAMETER_TYPES.some((type) => type === value);
}
