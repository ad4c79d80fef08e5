/**
 * Splits one CSV record (RFC 4180 quoting, `""` escapes a quote). Unquoted
 * fields are trimmed. Returns `null` when a quoted field is never closed.
 */
export function parseCsvLine(line: string): string[] | null {
  const fields: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quoted) {
      if (ch !== '"') {
        field += ch;
      } else if (line[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
      continue;
    }

    if (ch === '"' && field.trim() === "") {
      quoted = true;
      field = "";
    } else if (ch === ",") {
      fields.push(field.trim());
      field = "";
    } else {
      field += ch;
    }
  }

  if (quoted) {
    return null;
  }
  fields.push(field.trim());
  return fields;
}
