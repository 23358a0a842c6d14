import { WebSearchResult } from '../../search/interfaces/web-search.interface';

export const RESEARCH_SYSTEM_PROMPT =
  'You are a finance transformation research assistant. ' +
  'Answer in markdown. When sources are provided, ground the answer in them ' +
  'and cite them inline as [1], [2]. Say so plainly when the sources do not cover the question.';

// 소스 본문은 프롬프트 길이를 제한하기 위해 잘라서 사용
const MAX_SOURCE_CHARS = 1500;

export function buildResearchPrompt(
  question: string,
  sources: readonly WebSearchResult[],
): string {
  if (sources.length === 0) {
    return `### Question\n${question.trim()}\n\nNo web sources are available. Answer from general knowledge.`;
  }

  const sourceBlocks = sources.map(
    (source, index) =>
      `[${index + 1}] ${source.title}\n${source.url}\n${source.content.slice(0, MAX_SOURCE_CHARS)}`,
  );

  return `### Question\n${question.trim()}\n\n### Sources\n${sourceBlocks.join('\n\n')}`;
}
