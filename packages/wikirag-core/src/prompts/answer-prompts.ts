import type { ChatMessage, ResponseStyle } from '../schemas/chat.schema';

const NO_CONTEXT = 'No relevant context found.';

/**
 * One-line descriptions shown in the style menu
 */
export const RESPONSE_STYLE_DESCRIPTIONS: Record<ResponseStyle, string> = {
  default: 'Normal factual responses',
  pirate: "Pirate-themed responses with 'arr' and 'matey'",
  kid: 'Simple explanations suitable for children',
  bullets: 'Organized bullet-point format'
};

const SYSTEM_PROMPTS: Record<ResponseStyle, string> = {
  default: `You are a helpful assistant answering questions from Wikipedia content.
- Answer accurately using the provided context
- If the context does not cover the question, say so plainly and share what it does cover`,

  pirate: `You are a pirate answering questions from Wikipedia content.
- Talk like a pirate: 'arr', 'matey', 'ye' and the like
- Keep the facts straight; only the voice is salty
- If the context runs dry, admit it like a true buccaneer`,

  kid: `You are a friendly teacher explaining things to children.
- Use simple words, short sentences and fun comparisons
- Stay accurate to the Wikipedia context
- If the context does not have the answer, say so kindly`,

  bullets: `You are an assistant that answers in clear bullet points.
- Use bullets, and sub-bullets when they help
- Base every point on the Wikipedia context
- If the context is insufficient, say so as a bullet`
};

/**
 * Single worked exchange per style, showing the voice to the model
 */
const FEW_SHOT: Partial<Record<ResponseStyle, { question: string; context: string; answer: string }>> = {
  pirate: {
    context: 'The Pacific is the largest and deepest of the oceans.',
    question: 'Which ocean is the biggest?',
    answer: "Arr, matey! The mighty Pacific be the biggest and deepest ocean of 'em all. A fine place to lose yer hat!"
  },
  kid: {
    context: 'A blue whale can grow to about 30 metres long.',
    question: 'How long is a blue whale?',
    answer: 'A blue whale can be about 30 metres long. That is longer than two school buses parked in a row!'
  },
  bullets: {
    context: 'TypeScript is a programming language developed by Microsoft and first released in 2012. It adds static types to JavaScript.',
    question: 'What is TypeScript?',
    answer: '• **Type**: Programming language\n• **Developer**: Microsoft\n• **First release**: 2012\n• **Key idea**: Adds static types to JavaScript'
  }
};

export function getAvailableStyles(): ResponseStyle[] {
  return ['default', 'pirate', 'kid', 'bullets'];
}

/**
 * Build the chat messages for answering a question from retrieved chunks
 */
export function buildAnswerMessages(
  context: readonly string[],
  question: string,
  style: ResponseStyle = 'default'
): ChatMessage[] {
  const systemPrompt = SYSTEM_PROMPTS[style] ?? SYSTEM_PROMPTS.default;
  const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt }];

  const example = FEW_SHOT[style];
  if (example) {
    messages.push(
      { role: 'user', content: `Context: ${example.context}\n\n${example.question}` },
      { role: 'assistant', content: example.answer }
    );
  }

  const formattedContext = context.length > 0 ? context.join('\n\n') : NO_CONTEXT;

  messages.push({
    role: 'user',
    content: `Context from Wikipedia:\n${formattedContext}\n\nQuestion: ${question}`
  });

  return messages;
}

/**
 * Short, word-aligned preview of the context for display
 */
export function formatContextPreview(context: readonly string[], maxLength = 200): string {
  if (context.length === 0) {
    return 'No context available';
  }

  const full = context.join(' ');
  if (full.length <= maxLength) {
    return full;
  }

  const cut = full.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  const preview = lastSpace === -1 ? cut : cut.slice(0, lastSpace);

  return `${preview}...`;
}
