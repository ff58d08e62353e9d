export const CONTENT_SEPARATOR = '\n';

const RUBRIC = `Provide a score from 0 to 10 based on your confidence in the answer:
- 10 = strongly yes, definitely true
- 7-9 = probably yes, likely true
- 5-6 = uncertain, could go either way
- 3-4 = probably no, likely false
- 0-2 = strongly no, definitely false`;

/**
 * Builds the judgment prompt. Content parts are joined in order, one per line,
 * and the prompt ends with a `Score:` cue so the reply starts with the number.
 */
export function buildPrompt(contentParts: readonly string[], question: string): string {
  const content = contentParts.join(CONTENT_SEPARATOR);
  return `Based on the following content, answer this yes/no question: ${question}

Content:
${content}

${RUBRIC}

Provide only a single number from 0 to 10.
Score:`;
}

export default buildPrompt;
