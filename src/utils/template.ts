// ── Types ────────────────────────────────────────────────────

export type TemplateVars = Readonly<Record<string, string>>;

// ── Error ────────────────────────────────────────────────────

export class TemplateError extends Error {
  readonly template: string;

  constructor(template: string, reason: string) {
    super(`${reason} in template "${template}"`);
    this.name = 'TemplateError';
    this.template = template;
  }
}

// ── Formatting ───────────────────────────────────────────────

const TOKEN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;
const NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Fill `{name}` placeholders from `vars`.
 * `{{` and `}}` produce literal braces. Unknown names and stray braces
 * are errors, never silently left in place.
 */
export function formatTemplate(template: string, vars: TemplateVars): string {
  return template.replace(TOKEN, (token: string, name: string | undefined) => {
    if (token === '{{') return '{';
    if (token === '}}') return '}';
    if (name === undefined) {
      throw new TemplateError(template, `Unbalanced "${token}"`);
    }
    if (!NAME.test(name)) {
      throw new TemplateError(template, `Invalid placeholder "{${name}}"`);
    }
    const value = vars[name];
    if (value === undefined) {
      throw new TemplateError(template, `Unknown placeholder "{${name}}"`);
    }
    return value;
  });
}
