const placeholderPattern = /{{\s*([\w.]+)\s*}}/g;

/**
 * Fill `{{key}}` placeholders from params. Dotted keys walk nested objects.
 * Unknown keys render as `(null)`.
 */
export function fillTemplate(
  template: string,
  params: Record<string, unknown>,
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(placeholderPattern, (_match, key: string) => {
    let value: unknown = params;

    for (const part of key.split('.')) {
      if (value === null || typeof value !== 'object') {
        value = undefined;
        break;
      }

      value = Reflect.get(value, part);
    }

    if (value === undefined || value === null) {
      return '(null)';
    }

    return typeof value === 'object' ? JSON.stringify(value) : String(value);
  });
}
