const PROSE_PREFIXES = ['Here', 'This', 'The', 'Note:', 'Remember:', 'Example:'];

/**
 * Strip markdown fences and chatty lead-in lines from a model reply.
 * Lines inside a fenced block are always kept. If nothing survives, the
 * trimmed reply is returned unchanged.
 */
export function cleanCodeResponse(response: string): string {
  const kept: string[] = [];
  let inCodeBlock = false;

  for (const line of response.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('```')) {
      inCodeBlock = !inCodeBlock;
      continue;
    }
    if (inCodeBlock || !PROSE_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) {
      kept.push(line);
    }
  }

  const cleaned = kept.join('\n').trim();
  return cleaned || response.trim();
}
