const WRAPPING_FENCE = /^```[\w-]*\n([\s\S]*)\n```$/;
const LEADING_LABEL = /^(?:answer|response|assistant)\s*:\s*/i;

/**
 * Clean model output for display
 */
export function formatResponse(raw: string): string {
  let text = raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();

  // Unwrap only when the whole answer is a single fenced block
  const fenced = WRAPPING_FENCE.exec(text);
  if (fenced && !fenced[1].includes('```')) {
    text = fenced[1].trim();
  }

  return text.replace(LEADING_LABEL, '').replace(/\n{3,}/g, '\n\n').trim();
}
