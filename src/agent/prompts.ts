export const TITLE_PROMPT = `You are naming a painting for an artist's portfolio.
Look at the image and suggest 10 distinct titles. Mix evocative, descriptive and playful options, each under eight words.
Return JSON only: an array of exactly 10 strings.`;

export interface DescriptionPromptInput {
  title: string;
  medium: string;
  dimensions: string;
  category: string;
  notes?: string;
}

export function descriptionPrompt(input: DescriptionPromptInput): string {
  const notes = input.notes ? `\nArtist's notes: ${input.notes}\n` : '';
  return `Write a gallery description for this painting.

Title: ${input.title}
Medium: ${input.medium}
Dimensions: ${input.dimensions}
Category: ${input.category}
${notes}
Two or three short paragraphs about subject, composition, colour and mood, in a warm and plain voice.
Return only the description text.`;
}

export function socialDescriptionPrompt(title: string, maxChars: number): string {
  return `Write a brief social media description for the painting titled "${title}".
One or two sentences on its mood and what makes it worth a look, at most ${maxChars} characters including spaces.
Return only the description. No hashtags and no title.`;
}

export function summaryPrompt(text: string, maxChars: number): string {
  return `Condense this painting description into one or two sentences for social media, at most ${maxChars} characters including spaces.
Return only the summary.

${text}`;
}
