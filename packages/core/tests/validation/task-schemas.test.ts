import { describe, it, expect } from 'vitest';
import type { z } from 'zod';
import {
  CreateTaskSchema,
  UpdateTaskSchema,
  ListTasksQuerySchema,
  TaskIdParamsSchema,
  QueryBooleanSchema,
  formatIssues,
} from '../../src/validation/task-schemas.js';

function issuesOf(result: z.SafeParseReturnType<unknown, unknown>): string {
  return result.success ? '' : formatIssues(result.error);
}

describe('CreateTaskSchema', () => {
  it('accepts a title only', () => {
    expect(CreateTaskSchema.parse({ title: 'Simple task' })).toEqual({ title: 'Simple task' });
  });

  it('accepts every field', () => {
    const body = { title: 'A', description: 'B', priority: 'High', status: 'In Progress' };
    expect(CreateTaskSchema.parse(body)).toEqual(body);
  });

  it('drops unknown keys', () => {
    expect(CreateTaskSchema.parse({ title: 'A', completed: true })).toEqual({ title: 'A' });
  });

  it('requires a title', () => {
    expect(issuesOf(CreateTaskSchema.safeParse({}))).toBe('title: Required');
  });

  it('leaves blank titles to the queries', () => {
    expect(CreateTaskSchema.safeParse({ title: '   ' }).success).toBe(true);
  });

  it('measures the title after trimming', () => {
    expect(CreateTaskSchema.safeParse({ title: `  ${'a'.repeat(255)}  ` }).success).toBe(true);
    expect(issuesOf(CreateTaskSchema.safeParse({ title: 'a'.repeat(256) })))
      .toBe('title: Title must be at most 255 characters');
  });

  it('caps the description at 1000 characters', () => {
    expect(CreateTaskSchema.safeParse({ title: 'x', description: 'd'.repeat(1000) }).success).toBe(true);
    expect(issuesOf(CreateTaskSchema.safeParse({ title: 'x', description: 'd'.repeat(1001) })))
      .toBe('description: Description must be at most 1000 characters');
  });

  it('rejects an unknown priority', () => {
    expect(CreateTaskSchema.safeParse({ title: 'x', priority: 'Urgent' }).success).toBe(false);
  });

  it('rejects the enum key instead of the wire value for status', () => {
    expect(CreateTaskSchema.safeParse({ title: 'x', status: 'NotStarted' }).success).toBe(false);
  });
});

describe('UpdateTaskSchema', () => {
  it('accepts an empty patch', () => {
    expect(UpdateTaskSchema.parse({})).toEqual({});
  });

  it('accepts nulls', () => {
    expect(UpdateTaskSchema.parse({ title: null, completed: null })).toEqual({ title: null, completed: null });
  });

  it('rejects a non-boolean completed flag', () => {
    expect(UpdateTaskSchema.safeParse({ completed: 'yes' }).success).toBe(false);
  });
});

describe('ListTasksQuerySchema', () => {
  it('applies defaults', () => {
    expect(ListTasksQuerySchema.parse({})).toEqual({ skip: 0, limit: 5 });
  });

  it('coerces query strings', () => {
    expect(ListTasksQuerySchema.parse({ skip: '10', limit: '20', completed: 'false' }))
      .toEqual({ skip: 10, limit: 20, completed: false });
  });

  it('rejects out-of-range limits', () => {
    expect(ListTasksQuerySchema.safeParse({ limit: '0' }).success).toBe(false);
    expect(ListTasksQuerySchema.safeParse({ limit: '101' }).success).toBe(false);
    expect(ListTasksQuerySchema.safeParse({ limit: '100' }).success).toBe(true);
  });

  it('rejects a negative skip', () => {
    expect(ListTasksQuerySchema.safeParse({ skip: '-1' }).success).toBe(false);
  });

  it('bounds skip to the safe integer range', () => {
    expect(ListTasksQuerySchema.parse({ skip: '9007199254740991' }).skip).toBe(Number.MAX_SAFE_INTEGER);
    expect(issuesOf(ListTasksQuerySchema.safeParse({ skip: '9007199254740992' })))
      .toBe('skip: Number must be less than or equal to 9007199254740991');
  });

  it.each(['', '0x2', '1e3', '2.0', ' '])('rejects %j as a number', (raw) => {
    expect(issuesOf(ListTasksQuerySchema.safeParse({ skip: raw }))).toBe('skip: Input should be a valid integer');
  });
});

describe('QueryBooleanSchema', () => {
  it.each([
    ['true', true], ['TRUE', true], ['1', true], ['yes', true], ['on', true],
    ['false', false], ['False', false], ['0', false], ['no', false], ['off', false],
  ])('parses %s', (raw, expected) => {
    expect(QueryBooleanSchema.parse(raw)).toBe(expected);
  });

  it('rejects anything else', () => {
    expect(issuesOf(QueryBooleanSchema.safeParse('maybe'))).toBe('Input should be a valid boolean');
  });
});

describe('TaskIdParamsSchema', () => {
  it('coerces numeric ids', () => {
    expect(TaskIdParamsSchema.parse({ id: '12' })).toEqual({ id: 12 });
  });

  it('rejects non-numeric ids', () => {
    expect(TaskIdParamsSchema.safeParse({ id: 'abc' }).success).toBe(false);
    expect(TaskIdParamsSchema.safeParse({ id: '1.5' }).success).toBe(false);
  });

  it.each(['0x2', '1e3', ''])('rejects alternative number spellings like %j', (raw) => {
    expect(issuesOf(TaskIdParamsSchema.safeParse({ id: raw }))).toBe('id: Input should be a valid integer');
  });

  it('passes negative ids through for the lookup to miss', () => {
    expect(TaskIdParamsSchema.parse({ id: '-3' })).toEqual({ id: -3 });
  });
});
