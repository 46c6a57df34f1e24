export interface SummaryPromptInput {
  text: string;
  sentences: number;
  title?: string;
}

export function buildSummaryPrompt(input: SummaryPromptInput): string {
  const shortBody = input.text.trim().length < 120;
  const noun = input.sentences === 1 ? "sentence" : "sentences";

  return [
    "You are a helpful assistant that creates concise article summaries for a morning news briefing.",
    "Write in a neutral, fact-focused tone and paraphrase rather than quote the source.",
    "Never state you cannot access or browse the article; all required information is provided below.",
    shortBody ? "The article body is minimal. Summarise what it does say without asking for more." : "",
    `Summarize the following article in exactly ${input.sentences} ${noun}.`,
    "Reply with the summary only: no heading, label, list, markdown or commentary.",
    input.title ? `Article title: ${input.title}` : "",
    "Article body:",
    input.text.trim()
  ]
    .filter(Boolean)
    .join("\n");
}
