import { describe, expect, it } from 'vitest';
import {
  InvalidTransitionError,
  StepStateTable,
  canTransition,
  isSatisfied,
  isTerminalStatus,
} from '../../../src/engine/state-machine.js';

describe('step state machine', () => {
  it('allows the normal lifecycle', () => {
    expect(canTransition('pending', 'ready')).toBe(true);
    expect(canTransition('ready', 'running')).toBe(true);
    expect(canTransition('running', 'succeeded')).toBe(true);
    expect(canTransition('ready', 'skipped')).toBe(true);
  });

  it('lets a blocked step fail', () => {
    expect(canTransition('pending', 'blocked')).toBe(true);
    expect(canTransition('blocked', 'failed')).toBe(true);
  });

  it('forbids leaving a terminal state', () => {
    for (const terminal of ['succeeded', 'failed', 'skipped'] as const) {
      expect(isTerminalStatus(terminal)).toBe(true);
      expect(canTransition(terminal, 'running')).toBe(false);
    }
    expect(canTransition('pending', 'succeeded')).toBe(false);
  });

  it('only succeeded and skipped satisfy dependents', () => {
    expect(isSatisfied('succeeded')).toBe(true);
    expect(isSatisfied('skipped')).toBe(true);
    expect(isSatisfied('failed')).toBe(false);
    expect(isSatisfied('blocked')).toBe(false);
    expect(isSatisfied('running')).toBe(false);
  });
});

describe('StepStateTable', () => {
  it('starts every step pending and advances along a path', () => {
    const table = new StepStateTable(['a', 'b']);
    expect(table.entries()).toEqual([
      ['a', 'pending'],
      ['b', 'pending'],
    ]);
    table.advance('a', 'ready', 'running', 'succeeded');
    expect(table.get('a')).toBe('succeeded');
  });

  it('rejects invalid transitions', () => {
    const table = new StepStateTable(['a']);
    expect(() => table.transition('a', 'running')).toThrow(InvalidTransitionError);
    expect(() => table.transition('a', 'running')).toThrow('Invalid step state transition for "a": pending -> running');
  });

  it('rejects unknown steps', () => {
    expect(() => new StepStateTable([]).get('ghost')).toThrow('Unknown step "ghost"');
  });
});
