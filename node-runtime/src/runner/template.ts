const PLACEHOLDER = /\{\{params\.(\w+)\}\}/g;

/** Replaces `{{params.<name>}}` placeholders; unknown names become ''. */
export function substituteParameters(template: string, params: Record<string, unknown>): string {
  return template.replace(PLACEHOLDER, (_, key: string) =>
    Object.hasOwn(params, key) ? String(params[key] ?? '') : '',
  );
}
