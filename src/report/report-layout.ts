export type ReportLayoutName = 'classic' | 'compact';

export const REPORT_LAYOUT_NAMES: readonly ReportLayoutName[] = [
  'classic',
  'compact',
];

export interface ReportFontSizes {
  title: number;
  subtitle: number;
  sectionTitle: number;
  body: number;
  small: number;
}

export interface ReportLayout {
  name: ReportLayoutName;
  size: 'A4' | 'LETTER';
  orientation: 'landscape' | 'portrait';
  bannerColor: string;
  accentColor: string;
  textColor: string;
  columnCount: number;
  headerHeight: number;
  margin: number;
  columnGap: number;
  fontSizes: ReportFontSizes;
}

export const REPORT_LAYOUTS: Readonly<Record<ReportLayoutName, ReportLayout>> =
  {
    classic: {
      name: 'classic',
      size: 'A4',
      orientation: 'landscape',
      bannerColor: '#003B73',
      accentColor: '#00B4FF',
      textColor: '#000000',
      columnCount: 3,
      headerHeight: 82,
      margin: 20,
      columnGap: 20,
      fontSizes: {
        title: 20,
        subtitle: 11,
        sectionTitle: 12,
        body: 9,
        small: 7.5,
      },
    },
    compact: {
      name: 'compact',
      size: 'A4',
      orientation: 'portrait',
      bannerColor: '#1F2A44',
      accentColor: '#F2A900',
      textColor: '#222222',
      columnCount: 2,
      headerHeight: 96,
      margin: 24,
      columnGap: 18,
      fontSizes: {
        title: 18,
        subtitle: 10,
        sectionTitle: 11,
        body: 8.5,
        small: 7,
      },
    },
  };

export interface ColumnFrame {
  x: number;
  width: number;
}

/**
 * 페이지 폭을 레이아웃의 열 수로 나눈 열 위치를 계산합니다
 */
export function computeColumns(
  layout: ReportLayout,
  pageWidth: number,
): ColumnFrame[] {
  const usableWidth = pageWidth - 2 * layout.margin;
  const width =
    (usableWidth - (layout.columnCount - 1) * layout.columnGap) /
    layout.columnCount;

  return Array.from({ length: layout.columnCount }, (_, index) => ({
    x: layout.margin + index * (width + layout.columnGap),
    width,
  }));
}

/**
 * 섹션을 열에 배치합니다. 열보다 섹션이 많으면 남는 섹션은 마지막 열에 이어 붙입니다.
 */
export function distributeSections<T>(
  sections: readonly T[],
  columnCount: number,
): T[][] {
  const columns: T[][] = Array.from({ length: columnCount }, () => []);

  sections.forEach((section, index) => {
    columns[Math.min(index, columnCount - 1)].push(section);
  });

  return columns;
}
