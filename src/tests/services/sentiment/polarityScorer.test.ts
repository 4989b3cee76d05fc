import { describe, it, expect } from 'vitest';
import { AfinnPolarityScorer } from '@/services/sentiment/polarityScorer';

describe('AfinnPolarityScorer', () => {
  const scorer = new AfinnPolarityScorer();

  it('scales the mean word weight into [-1, 1]', () => {
    const result = scorer.score('This is good');

    expect(result.polarity).toBeCloseTo(0.6);
    expect(result.subjectivity).toBeCloseTo(1 / 3);
  });

  it('scores negative words below zero', () => {
    expect(scorer.score('bad').polarity).toBeCloseTo(-0.6);
  });

  it('scores market slang from the extra lexicon', () => {
    const result = scorer.score('bullish on this');

    expect(result.polarity).toBeCloseTo(0.6);
    expect(result.subjectivity).toBeCloseTo(1 / 3);
  });

  it('returns zero for text without scored words', () => {
    expect(scorer.score('')).toEqual({ polarity: 0, subjectivity: 0 });
    expect(scorer.score('the quarterly report')).toEqual({ polarity: 0, subjectivity: 0 });
  });

  it('clamps custom weights beyond the AFINN range', () => {
    const custom = new AfinnPolarityScorer({ zorp: 10 });

    expect(custom.score('zorp')).toEqual({ polarity: 1, subjectivity: 1 });
  });
});
