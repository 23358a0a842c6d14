import {
  computeColumns,
  distributeSections,
  REPORT_LAYOUTS,
} from './report-layout';

describe('report-layout', () => {
  describe('computeColumns', () => {
    it('classic 레이아웃은 세 개의 열로 나누어야 함', () => {
      // (1000 - 2*20 - 2*20) / 3 = 306.67
      const columns = computeColumns(REPORT_LAYOUTS.classic, 1000);

      expect(columns).toHaveLength(3);
      expect(columns[0].x).toBe(20);
      expect(columns[0].width).toBeCloseTo(306.667, 2);
      expect(columns[1].x).toBeCloseTo(346.667, 2);
      expect(columns[2].x).toBeCloseTo(673.333, 2);
    });

    it('compact 레이아웃은 두 개의 열로 나누어야 함', () => {
      // (600 - 2*24 - 18) / 2 = 267
      const columns = computeColumns(REPORT_LAYOUTS.compact, 600);

      expect(columns).toEqual([
        { x: 24, width: 267 },
        { x: 309, width: 267 },
      ]);
    });
  });

  describe('distributeSections', () => {
    it('열 수만큼 섹션이 있으면 하나씩 배치해야 함', () => {
      expect(distributeSections(['a', 'b', 'c'], 3)).toEqual([
        ['a'],
        ['b'],
        ['c'],
      ]);
    });

    it('남는 섹션은 마지막 열에 이어 붙여야 함', () => {
      expect(distributeSections(['a', 'b', 'c'], 2)).toEqual([
        ['a'],
        ['b', 'c'],
      ]);
    });

    it('섹션이 적으면 빈 열을 남겨야 함', () => {
      expect(distributeSections(['a'], 3)).toEqual([['a'], [], []]);
    });
  });
});
