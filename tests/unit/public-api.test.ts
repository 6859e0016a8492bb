import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the client entry points', async () => {
    const { openThingsClient, ThingsClient } = await import('../../src/index.js');
    expect(typeof openThingsClient).toBe('function');
    expect(typeof ThingsClient).toBe('function'); // class is a function
  });

  it('exports the filter algebra', async () => {
    const { filter, FilterBuilder, compileFilter } = await import('../../src/index.js');
    expect(compileFilter(filter.equal('c', true))).toBe('c IS NOT NULL');
    expect(FilterBuilder.empty.compile()).toBe('TRUE');
  });

  it('exports the date codec', async () => {
    const { decodeDate, formatPackedDate } = await import('../../src/index.js');
    expect(decodeDate(132464128)).toEqual({ year: 2021, month: 3, day: 28 });
    expect(formatPackedDate(132464128)).toBe('2021-03-28');
  });

  it('exports error classes usable with instanceof', async () => {
    const { FormatError, ThingsError } = await import('../../src/index.js');
    const err = new FormatError('x');
    expect(err).toBeInstanceOf(ThingsError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('FormatError');
  });

  it('exports the status constants', async () => {
    const { Status, TaskType, StartBucket } = await import('../../src/index.js');
    expect(Status.Completed).toBe(3);
    expect(TaskType.Heading).toBe(2);
    expect(StartBucket.Someday).toBe(2);
  });

  it('does NOT export row mappers (internal)', async () => {
    const api = await import('../../src/index.js');
    expect('mapTaskRow' in api).toBe(false);
  });

  it('does NOT export SQL templates (internal)', async () => {
    const api = await import('../../src/index.js');
    expect('buildTasksSQL' in api).toBe(false);
  });
});
