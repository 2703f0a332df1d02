import { describe, it, expect } from 'vitest';
import { APIKeyRotator, maskKey } from '../gateway/APIKeyRotator';
import { ConfigurationError } from '../gateway/errors';

describe('APIKeyRotator', () => {
  it('should_startAtFirstKey_and_wrapAround', () => {
    const rotator = new APIKeyRotator(['a', 'b', 'c']);

    const sequence = Array.from({ length: 4 }, () => rotator.getNextKey());

    expect(sequence).toEqual(['a', 'b', 'c', 'a']);
    expect(rotator.cursor).toBe(1);
  });

  it('should_returnEachKeyEqually_when_callsAreMultipleOfKeyCount', () => {
    const keys = ['a', 'b', 'c'];
    const rotator = new APIKeyRotator(keys);

    const sequence = Array.from({ length: 30 }, () => rotator.getNextKey());

    for (const key of keys) {
      expect(sequence.filter((k) => k === key)).toHaveLength(10);
    }
    for (let i = keys.length; i < sequence.length; i++) {
      expect(sequence[i]).toBe(sequence[i - keys.length]);
    }
  });

  it('should_alwaysReturnSameKey_when_onlyOneConfigured', () => {
    const rotator = new APIKeyRotator(['solo']);

    expect([rotator.getNextKey(), rotator.getNextKey()]).toEqual(['solo', 'solo']);
    expect(rotator.cursor).toBe(0);
  });

  it('should_throwConfigurationError_when_noKeys', () => {
    expect(() => new APIKeyRotator([])).toThrow(ConfigurationError);
  });

  it('should_issueDistinctSlots_when_calledConcurrently', async () => {
    const rotator = new APIKeyRotator(['a', 'b', 'c']);

    const results = await Promise.all(
      Array.from({ length: 50 }, async () => {
        await Promise.resolve();
        const slot = rotator.slotsIssued;
        return { slot, key: rotator.getNextKey() };
      })
    );

    expect(rotator.slotsIssued).toBe(50);
    expect(rotator.cursor).toBe(50 % 3);
    expect(new Set(results.map((r) => r.slot)).size).toBe(50);
    expect(results.filter((r) => r.key === 'a')).toHaveLength(17);
    expect(results.filter((r) => r.key === 'b')).toHaveLength(17);
    expect(results.filter((r) => r.key === 'c')).toHaveLength(16);
  });
});

describe('maskKey', () => {
  it('should_keepLastFourCharacters', () => {
    expect(maskKey('test-key-1234')).toBe('****1234');
  });

  it('should_hideShortKeysCompletely', () => {
    expect(maskKey('abcd')).toBe('****');
  });
});
