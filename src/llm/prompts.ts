export const DEFAULT_REVIEW_PROMPT = `You are a senior code reviewer. Review the code below and provide actionable feedback.

Start with a brief overall assessment in 2-3 sentences, then list the issues you found.
For each issue, name the file and line, explain what is wrong and suggest a fix.

Rules:
- Focus on bugs, security issues, performance problems, and code quality
- Be specific and actionable
- If the code looks good, say so and keep the review short
- Do not comment on formatting or style unless it significantly impacts readability`;

export function joinPromptFragments(fragments: readonly string[]): string {
  return fragments
    .map((fragment) => fragment.trim())
    .filter(Boolean)
    .join("\n\n");
}

/** Used by vendors that take one prompt string rather than a system/user pair. */
export function buildCombinedPrompt(prompt: string, content: string): string {
  return `${prompt}\n\n---\n\n**Code to Review:**\n\n\`\`\`diff\n${content}\n\`\`\``;
}

export function buildUserMessage(content: string): string {
  return `Please review the following code:\n\`\`\`diff\n${content}\n\`\`\``;
}
