// Webhook templates: `{{name}}` placeholders over the alert or report payload. Dotted names
// reach into nested values (`report.uptime_pct`, `affected_endpoints.0.path`).

export type TemplateVars = Record<string, unknown>;

const PLACEHOLDER = /\{\{\s*([\w.]+)\s*\}\}/g;

export function lookupVar(vars: TemplateVars, name: string): unknown {
  let cur: unknown = vars;
  for (const segment of name.split('.')) {
    if (Array.isArray(cur)) {
      cur = /^\d+$/.test(segment) ? cur[Number(segment)] : undefined;
    } else if (cur !== null && typeof cur === 'object') {
      // Own properties only, so `constructor` and friends resolve to nothing.
      cur = Object.getOwnPropertyDescriptor(cur, segment)?.value;
    } else {
      return undefined;
    }
  }
  return cur;
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => stringify(lookupVar(vars, name)));
}

// Renders every string inside a JSON payload template; other values pass through.
export function renderTemplateValue(value: unknown, vars: TemplateVars): unknown {
  if (typeof value === 'string') return renderTemplate(value, vars);
  if (Array.isArray(value)) return value.map((item) => renderTemplateValue(item, vars));
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, renderTemplateValue(item, vars)]),
    );
  }
  return value;
}
