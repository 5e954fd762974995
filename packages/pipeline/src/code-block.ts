const FENCE_PATTERN = /```([\w+-]*)[^\n]*\n([\s\S]*?)```/g;

/**
 * Pull source code out of a reasoning-service reply. The first fenced block
 * tagged with one of `languages` wins, then the first fenced block of any
 * kind; a reply without fences is returned trimmed.
 */
export function extractCodeBlock(reply: string, languages: readonly string[] = ['python', 'py']): string {
  const blocks = [...reply.matchAll(FENCE_PATTERN)].map((match) => ({
    language: match[1].toLowerCase(),
    body: match[2],
  }));

  const tagged = blocks.find((block) => languages.includes(block.language));
  const chosen = tagged ?? blocks[0];
  return chosen ? chosen.body.trim() : reply.trim();
}
