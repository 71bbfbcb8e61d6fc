import { describe, it, expect, vi } from 'vitest';
import { normalizeToolArgs } from '@/domains/agent/tools/normalizeToolArgs';

vi.mock('@/shared/utils/logger', () => ({
  createChildLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('normalizeToolArgs', () => {
  it('should return objects as they are', () => {
    const args = { query: 'SELECT 1' };

    expect(normalizeToolArgs(args, 'read_query')).toBe(args);
  });

  it('should parse a JSON object string', () => {
    expect(normalizeToolArgs('{"response_haiku": true}', 'route_to_university_poet')).toEqual({
      response_haiku: true,
    });
  });

  it.each([
    ['malformed JSON', '{"query": '],
    ['a JSON array', '[1, 2]'],
    ['a number', 42],
    ['null', null],
    ['undefined', undefined],
    ['an array', ['SELECT 1']],
  ])('should return an empty object for %s', (_label, args) => {
    expect(normalizeToolArgs(args)).toEqual({});
  });
});
