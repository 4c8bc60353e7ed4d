/**
 * Pull the JSON object out of a model reply.
 *
 * Models wrap JSON in code fences or add a sentence around it often enough
 * that a bare JSON.parse is not reliable. Throws when no object parses.
 */
export function extractJsonObject(reply: string): unknown {
  const text = stripCodeFence(reply.trim());

  try {
    return JSON.parse(text);
  } catch {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new SyntaxError('Reply does not contain a JSON object');
    }
    return JSON.parse(text.slice(start, end + 1));
  }
}

function stripCodeFence(text: string): string {
  const lines = text.split('\n');
  if (lines.length < 3) {
    return text;
  }

  const [first, ...body] = lines;
  const last = body.pop();

  if (!first?.startsWith('```') || last?.trim() !== '```') {
    return text;
  }

  return body.join('\n');
}
