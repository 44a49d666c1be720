import { describe, it, expect } from 'vitest';
import { DialogueMemory } from '../src/services/memory.js';

describe('DialogueMemory', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new DialogueMemory({ capacity: 0 })).toThrow('positive integer');
  });

  it('keeps at most five turns by default, evicting the oldest', () => {
    const memory = new DialogueMemory();
    for (let i = 1; i <= 7; i++) {
      memory.record(i % 2 === 1 ? 'user' : 'assistant', `turn ${i}`);
    }

    expect(memory.capacity).toBe(5);
    expect(memory.size).toBe(5);
    expect(memory.turns().map((t) => t.text)).toEqual(['turn 3', 'turn 4', 'turn 5', 'turn 6', 'turn 7']);
  });

  it('returns frozen turns', () => {
    const memory = new DialogueMemory();
    const turn = memory.record('user', 'hello');
    expect(Object.isFrozen(turn)).toBe(true);
    expect(turn.timestamp).toBeInstanceOf(Date);
  });

  it('renders nothing when empty', () => {
    expect(new DialogueMemory().renderContext()).toBe('');
  });

  it('renders a lone user turn', () => {
    const memory = new DialogueMemory();
    memory.record('user', 'hi');
    expect(memory.renderContext()).toBe('User: hi');
  });

  it('renders the most recent pairs in order with custom labels', () => {
    const memory = new DialogueMemory({
      capacity: 10,
      contextPairs: 2,
      roleLabels: { user: '用户', assistant: '助手' },
    });
    memory.record('user', 'q1');
    memory.record('assistant', 'a1');
    memory.record('user', 'q2');
    memory.record('assistant', 'a2');
    memory.record('user', 'q3');

    expect(memory.renderContext()).toBe('用户: q2\n助手: a2\n用户: q3');
  });

  it('skips an assistant turn whose user turn was evicted', () => {
    const memory = new DialogueMemory({ capacity: 3 });
    memory.record('user', 'q1');
    memory.record('assistant', 'a1');
    memory.record('user', 'q2');
    memory.record('assistant', 'a2');

    expect(memory.renderContext()).toBe('User: q2\nAssistant: a2');
  });

  it('clears all turns', () => {
    const memory = new DialogueMemory();
    memory.record('user', 'hi');
    memory.clear();
    expect(memory.size).toBe(0);
    expect(memory.turns()).toEqual([]);
    memory.record('user', 'again');
    expect(memory.turns().map((t) => t.text)).toEqual(['again']);
  });
});
