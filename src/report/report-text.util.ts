/**
 * 마크다운 브리프의 첫 줄이 제목(#)이면 제거합니다
 */
export function stripLeadingHeading(markdown: string): string {
  const trimmed = markdown.trim();
  if (!trimmed.startsWith('#')) {
    return trimmed;
  }
  return trimmed.split('\n').slice(1).join('\n').trim();
}

/**
 * PDF 출력용으로 마크다운 강조/제목 기호를 제거합니다
 */
export function toPrintableText(markdown: string): string {
  return markdown
    .split('\n')
    .map((line) =>
      line
        .replace(/^\s*#{1,6}\s*/, '')
        .replace(/\*\*/g, '')
        .replace(/→/g, '->')
        .trimEnd(),
    )
    .join('\n')
    .trim();
}
