/**
 * Prompt helpers shared by the agents.
 */

/**
 * Truncates text to `maxLength` characters, marking the cut.
 */
export function truncateForPrompt(text: string, maxLength: number, label = 'content'): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}\n\n...(${label} truncated)`;
}

/**
 * Renders optional feedback as a prompt section, or nothing.
 */
export function feedbackSection(heading: string, feedback: string | undefined): string {
  const trimmed = feedback?.trim();
  if (!trimmed) return '';
  return `\n\n${heading}:\n${trimmed}`;
}
