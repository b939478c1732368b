import { VariableContext } from '../entities/Frame';
import { createPlaceholderPattern } from './PlaceholderParser';
import { stringifyContextValue } from './ValueCoercer';

/**
 * Replaces every placeholder occurrence in the template body.
 *
 * Per occurrence: the context value if the key is present (null and
 * undefined render as the empty string), else the inline default exactly as
 * the author wrote it (not the coerced schema default, so
 * `{{accent:color=ff0000}}` renders `ff0000`), else the empty string.
 * Values are inserted without HTML escaping.
 */
export function replaceParameters(body: string, context: VariableContext): string {
    return body.replace(
        createPlaceholderPattern(),
        (_raw: string, name: string, _type: string | undefined, defaultLiteral: string | undefined) => {
            if (Object.prototype.hasOwnProperty.call(context, name)) {
                return stringifyContextValue(context[name]);
            }
            return defaultLiteral ?? '';
        }
    );
}
