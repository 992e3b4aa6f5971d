/**
 * String fields of an urlencoded or JSON body; everything else is dropped.
 */
export function readFormFields(body: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (typeof body !== 'object' || body === null) {
    return fields;
  }
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      fields[key] = value;
    }
  }
  return fields;
}
