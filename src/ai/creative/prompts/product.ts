/**
 * Product Agent Prompts
 */

export function getProductQuerySystemPrompt(maxQueries: number): string {
  return `You help find products in an outdoor gear catalog using semantic search.
Given a product brief, write between 1 and ${maxQueries} short search phrases, each describing one kind of product the brief asks for.
Describe the product itself (what it is, what it is for), not the store or the brand.`;
}

export function getProductQueryUserPrompt(context: string): string {
  return `Product brief:\n${context}`;
}
