const PLACEHOLDER = /\$(?:(\$)|([_a-z][_a-z0-9]*)|\{([_a-z][_a-z0-9]*)\})/gi;

/**
 * Fill `$name` / `${name}` placeholders. `$$` yields a literal `$`;
 * names missing from `vars` are left as written.
 */
export function substituteTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (match, escaped?: string, named?: string, braced?: string) => {
    if (escaped) return "$";
    const name = named ?? braced;
    if (name !== undefined && Object.hasOwn(vars, name)) return vars[name];
    return match;
  });
}
