import {
  AMENITY_CATEGORIES,
  type AmenityRecord,
} from '../model/providers';
import {
  DEFAULT_WALK_SCORE_CONFIG,
  calculateWalkScore,
  distanceDecay,
} from '../scoring/walkScore';

const breakdownOf = (
  result: ReturnType<typeof calculateWalkScore>,
  category: string
) => result.breakdown.find((entry) => entry.category === category);

describe('distanceDecay', () => {
  test('400m 以内は満点、1600m 以上はゼロ、その間は線形', () => {
    expect(distanceDecay(0, DEFAULT_WALK_SCORE_CONFIG)).toBe(1);
    expect(distanceDecay(400, DEFAULT_WALK_SCORE_CONFIG)).toBe(1);
    expect(distanceDecay(1000, DEFAULT_WALK_SCORE_CONFIG)).toBe(0.5);
    expect(distanceDecay(1600, DEFAULT_WALK_SCORE_CONFIG)).toBe(0);
    expect(distanceDecay(5000, DEFAULT_WALK_SCORE_CONFIG)).toBe(0);
  });

  test('負の距離や NaN は寄与しない', () => {
    expect(distanceDecay(-10, DEFAULT_WALK_SCORE_CONFIG)).toBe(0);
    expect(distanceDecay(Number.NaN, DEFAULT_WALK_SCORE_CONFIG)).toBe(0);
  });
});

describe('calculateWalkScore', () => {
  test('施設ゼロならスコア0で、全カテゴリの内訳が返る', () => {
    const result = calculateWalkScore([]);

    expect(result.score).toBe(0);
    expect(result.totalAmenities).toBe(0);
    expect(result.countedAmenities).toBe(0);
    expect(result.breakdown.map((entry) => entry.category)).toEqual([
      ...AMENITY_CATEGORIES,
    ]);
    expect(result.breakdown.every((entry) => entry.contribution === 0)).toBe(true);
  });

  test('上限件数までの減衰値の平均に重みを掛ける', () => {
    const amenities: AmenityRecord[] = [
      { category: 'grocery', distanceM: 100 },
      { category: 'grocery', distanceM: 200 },
      { category: 'grocery', distanceM: 300 },
      { category: 'transit', distanceM: 1000 },
    ];

    const result = calculateWalkScore(amenities);

    // grocery: cap 2 → (1 + 1) / 2 × 20 = 20
    // transit: cap 3 → 0.5 / 3 × 15 = 2.5
    expect(result.score).toBe(22.5);
    expect(breakdownOf(result, 'grocery')).toEqual({
      category: 'grocery',
      found: 3,
      counted: 2,
      contribution: 20,
      maxContribution: 20,
    });
    expect(breakdownOf(result, 'transit')).toEqual({
      category: 'transit',
      found: 1,
      counted: 1,
      contribution: 2.5,
      maxContribution: 15,
    });
    expect(result.totalAmenities).toBe(4);
    expect(result.countedAmenities).toBe(3);
  });

  test('近い順に上限件数を採用する', () => {
    const result = calculateWalkScore([
      { category: 'grocery', distanceM: 1400 },
      { category: 'grocery', distanceM: 1000 },
      { category: 'grocery', distanceM: 50 },
    ]);

    // 上位2件: 1 と 0.5 → 1.5 / 2 × 20 = 15
    expect(result.score).toBe(15);
    expect(breakdownOf(result, 'grocery')?.counted).toBe(2);
  });

  test('カットオフより遠い施設は数えない', () => {
    const result = calculateWalkScore([
      { category: 'park', distanceM: 1600 },
      { category: 'park', distanceM: 2500 },
    ]);

    expect(result.score).toBe(0);
    expect(breakdownOf(result, 'park')).toEqual({
      category: 'park',
      found: 2,
      counted: 0,
      contribution: 0,
      maxContribution: 12,
    });
  });

  test('全カテゴリが上限まで揃えば 100 で頭打ち', () => {
    const amenities: AmenityRecord[] = [];
    for (const category of AMENITY_CATEGORIES) {
      for (let i = 0; i < 5; i += 1) {
        amenities.push({ category, distanceM: 10 * i });
      }
    }

    const result = calculateWalkScore(amenities);

    expect(result.score).toBe(100);
  });

  test('施設を追加してもスコアは下がらない', () => {
    const base: AmenityRecord[] = [
      { category: 'cafe', distanceM: 500 },
      { category: 'school', distanceM: 900 },
    ];
    const before = calculateWalkScore(base).score;
    const after = calculateWalkScore([
      ...base,
      { category: 'cafe', distanceM: 1500 },
      { category: 'bank', distanceM: 200 },
    ]).score;

    expect(after).toBeGreaterThanOrEqual(before);
  });

  test('設定に無いカテゴリは寄与しない', () => {
    const result = calculateWalkScore(
      [
        { category: 'grocery', distanceM: 0 },
        { category: 'bank', distanceM: 0 },
      ],
      {
        ...DEFAULT_WALK_SCORE_CONFIG,
        categories: { bank: { weight: 50, cap: 1 } },
      }
    );

    expect(result.score).toBe(50);
    expect(result.breakdown.map((entry) => entry.category)).toEqual(['bank']);
  });
});

describe('calculateWalkScore の性質', () => {
  // 乱数は使わず、固定の線形合同法で入力を作る
  const sequence = (seed: number) => {
    let state = seed;
    return () => {
      state = (state * 16807) % 2147483647;
      return state / 2147483647;
    };
  };

  const neighbourhood = (seed: number): AmenityRecord[] => {
    const next = sequence(seed);
    return Array.from({ length: 12 }, () => ({
      category: AMENITY_CATEGORIES[Math.floor(next() * AMENITY_CATEGORIES.length)],
      distanceM: Math.round(next() * 2000),
    }));
  };

  test('同じ入力なら結果も同じ', () => {
    for (const seed of [1, 7, 42, 2026]) {
      const amenities = neighbourhood(seed);

      expect(calculateWalkScore(amenities)).toEqual(calculateWalkScore(amenities));
      expect(calculateWalkScore([...amenities])).toEqual(calculateWalkScore(amenities));
    }
  });

  test('同じカテゴリでより近い施設を足してもスコアは下がらない', () => {
    for (const seed of [3, 11, 99]) {
      const amenities = neighbourhood(seed);
      const base = calculateWalkScore(amenities);

      for (const existing of amenities) {
        const closer: AmenityRecord = {
          category: existing.category,
          distanceM: Math.max(0, existing.distanceM - 1),
        };
        const extended = calculateWalkScore([...amenities, closer]);

        expect(extended.score).toBeGreaterThanOrEqual(base.score);
        expect(breakdownOf(extended, existing.category)?.contribution).toBeGreaterThanOrEqual(
          breakdownOf(base, existing.category)?.contribution ?? 0
        );
      }
    }
  });
});
