import { MissingFieldError, RenderError, describeError } from '../errors';

export type FieldValues = Record<string, string | number | boolean | null | undefined>;

export interface RenderResult {
    text: string;
    warning?: string;
}

/**
 * Substitute `{Field}` placeholders with values from the record.
 * `{{` and `}}` produce literal braces.
 */
export function renderTemplate(template: string, record: FieldValues): string {
    let output = '';
    let i = 0;

    while (i < template.length) {
        const ch = template[i];

        if (ch === '{') {
            if (template[i + 1] === '{') {
                output += '{';
                i += 2;
                continue;
            }
            const close = template.indexOf('}', i + 1);
            if (close === -1) {
                throw new RenderError(`Unmatched '{' at position ${i}`);
            }
            const field = template.slice(i + 1, close);
            if (field.length === 0) {
                throw new RenderError(`Empty placeholder at position ${i}`);
            }
            if (field.includes('{')) {
                throw new RenderError(`Nested '{' in placeholder at position ${i}`);
            }
            if (!Object.prototype.hasOwnProperty.call(record, field)) {
                throw new MissingFieldError(field);
            }
            output += toText(record[field]);
            i = close + 1;
            continue;
        }

        if (ch === '}') {
            if (template[i + 1] === '}') {
                output += '}';
                i += 2;
                continue;
            }
            throw new RenderError(`Single '}' at position ${i}`);
        }

        output += ch;
        i += 1;
    }

    return output;
}

// Preview rendering: falls back to the raw template
export function renderWithFallback(template: string, record: FieldValues): RenderResult {
    try {
        return { text: renderTemplate(template, record) };
    } catch (error) {
        return { text: template, warning: `Could not render template: ${describeError(error)}` };
    }
}

export function markdownToHtml(text: string): string {
    if (!text) {
        return '';
    }

    return text
        .replace(/\*\*(.*?)\*\*/g, '<b>$1</b>')
        .replace(
            /\[(.*?)\]\((https?:\/\/[^\s)]+)\)/g,
            '<a href="$2" style="color:#1a73e8; text-decoration:underline;" target="_blank">$1</a>',
        )
        .replace(/\n/g, '<br>')
        .replace(/ {2}/g, '&nbsp;&nbsp;');
}

export function wrapHtmlDocument(inner: string): string {
    return `<html><body style="font-family: 'Google Sans', Arial, sans-serif; font-size: 14px; line-height: 1.6;">
${inner}
</body></html>`;
}

export function renderBodyHtml(text: string): string {
    return wrapHtmlDocument(markdownToHtml(text));
}

function toText(value: FieldValues[string]): string {
    if (value === null || value === undefined) {
        return '';
    }
    return String(value);
}
