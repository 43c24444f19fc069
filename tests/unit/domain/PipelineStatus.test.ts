import { describe, it, expect } from 'vitest';
import { canTransition, isTerminal } from '../../../src/domain/model/PipelineStatus.js';

describe('PipelineStatus state machine', () => {
  it('should allow PENDING → FETCHING', () => {
    expect(canTransition('PENDING', 'FETCHING')).toBe(true);
  });

  it('should allow PENDING → FAILED (database unreachable)', () => {
    expect(canTransition('PENDING', 'FAILED')).toBe(true);
  });

  it('should allow FETCHING → LOADING', () => {
    expect(canTransition('FETCHING', 'LOADING')).toBe(true);
  });

  it('should allow FETCHING → FETCHING and FETCHING → DONE (empty dataset skipped)', () => {
    expect(canTransition('FETCHING', 'FETCHING')).toBe(true);
    expect(canTransition('FETCHING', 'DONE')).toBe(true);
  });

  it('should allow LOADING → FETCHING (next dataset)', () => {
    expect(canTransition('LOADING', 'FETCHING')).toBe(true);
  });

  it('should allow LOADING → DONE', () => {
    expect(canTransition('LOADING', 'DONE')).toBe(true);
  });

  it('should allow FETCHING and LOADING → FAILED', () => {
    expect(canTransition('FETCHING', 'FAILED')).toBe(true);
    expect(canTransition('LOADING', 'FAILED')).toBe(true);
  });

  it('should NOT allow DONE → anything', () => {
    expect(canTransition('DONE', 'FETCHING')).toBe(false);
    expect(canTransition('DONE', 'FAILED')).toBe(false);
  });

  it('should NOT allow FAILED → anything', () => {
    expect(canTransition('FAILED', 'FETCHING')).toBe(false);
    expect(canTransition('FAILED', 'PENDING')).toBe(false);
  });

  it('should NOT allow PENDING → LOADING or PENDING → DONE directly', () => {
    expect(canTransition('PENDING', 'LOADING')).toBe(false);
    expect(canTransition('PENDING', 'DONE')).toBe(false);
  });

  it('should report DONE and FAILED as terminal', () => {
    expect(isTerminal('DONE')).toBe(true);
    expect(isTerminal('FAILED')).toBe(true);
    expect(isTerminal('PENDING')).toBe(false);
    expect(isTerminal('LOADING')).toBe(false);
  });
});
