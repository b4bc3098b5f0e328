import { describe, it, expect } from 'vitest';
import { canTransition, IllegalUnitTransitionError, isTerminal, transitionUnit } from '../unitState.js';

describe('transitionUnit', () => {
  it('walks pending → processing → committed', () => {
    const processing = transitionUnit('pending', 'processing');
    expect(transitionUnit(processing, 'committed')).toBe('committed');
  });

  it('allows processing → rolled_back', () => {
    expect(transitionUnit('processing', 'rolled_back')).toBe('rolled_back');
  });

  it('refuses to skip processing', () => {
    expect(() => transitionUnit('pending', 'committed')).toThrow(IllegalUnitTransitionError);
  });

  it('has no retry out of rolled_back', () => {
    expect(canTransition('rolled_back', 'processing')).toBe(false);
    expect(() => transitionUnit('rolled_back', 'pending')).toThrow('Illegal unit transition rolled_back → pending');
  });

  it('treats committed and rolled_back as terminal', () => {
    expect(isTerminal('committed')).toBe(true);
    expect(isTerminal('rolled_back')).toBe(true);
    expect(isTerminal('processing')).toBe(false);
  });
});
