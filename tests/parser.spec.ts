import { FALLBACK_SCORE, parseScore, parseScoreDetailed, stripDeliberation } from '../src/services/parser';

describe('parseScore', () => {
  it('reads the first integer in the reply', () => {
    expect(parseScore('Score: 7')).toBe(7);
    expect(parseScore('3')).toBe(3);
    expect(parseScore('7-9 probably yes')).toBe(7);
  });

  it('clamps out-of-range values', () => {
    expect(parseScore('10/10, absolutely')).toBe(10);
    expect(parseScore('-3')).toBe(0);
    expect(parseScore('42')).toBe(10);
    expect(parseScore('123456789012345678901234567890')).toBe(10);
  });

  it('treats a dash after a letter as punctuation, not a sign', () => {
    expect(parseScore('Q-3')).toBe(3);
  });

  it('falls back to 5 when there is no number', () => {
    expect(parseScore('I think this is definitely correct.')).toBe(FALLBACK_SCORE);
    expect(parseScore('')).toBe(5);
    expect(parseScore(null)).toBe(5);
    expect(parseScore(undefined)).toBe(5);
  });

  it('reports whether the fallback was used', () => {
    expect(parseScoreDetailed('no digits here')).toEqual({ score: 5, fallback: true });
    expect(parseScoreDetailed('5')).toEqual({ score: 5, fallback: false });
  });

  it('ignores numbers inside deliberation', () => {
    expect(parseScore('<think>maybe 3, maybe 4</think>\n\n8')).toBe(8);
    expect(parseScore('step 1, step 2 </think> 6')).toBe(6);
  });

  it('falls back when deliberation never finished', () => {
    expect(parseScoreDetailed('<think>\nweighing 2 against 9')).toEqual({ score: 5, fallback: true });
  });

  it('always returns an integer in range', () => {
    const replies = ['Score: 7', '-100', '99', '8.5', 'nope', '<think>1</think>', 'answer: 0', '10'];
    for (const reply of replies) {
      const score = parseScore(reply);
      expect(Number.isInteger(score)).toBe(true);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(10);
    }
  });
});

describe('stripDeliberation', () => {
  it('keeps text after the last closing tag', () => {
    expect(stripDeliberation('<think>a</think>b<think>c</think>d')).toBe('d');
  });

  it('leaves plain replies untouched', () => {
    expect(stripDeliberation('Score: 4')).toBe('Score: 4');
  });
});
