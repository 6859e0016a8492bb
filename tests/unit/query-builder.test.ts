import { describe, it, expect } from 'vitest';
import { FilterBuilder } from '../../src/query/builder.js';
import { filter } from '../../src/query/filters.js';
import { FormatError } from '../../src/errors.js';

describe('FilterBuilder', () => {

  // ---------------------------------------------------------------------------
  // Empty builders
  // ---------------------------------------------------------------------------
  describe('empty', () => {
    it('compiles zero filters to TRUE', () => {
      expect(FilterBuilder.empty.compile()).toBe('TRUE');
      expect(FilterBuilder.empty.isEmpty()).toBe(true);
    });

    it('compiles all-empty filters to TRUE', () => {
      const fb = FilterBuilder.empty
        .addEqual('TASK.area', undefined)
        .addSearch('')
        .addUnixTimeRange('TASK.creationDate', '7')
        .addParsedPackedDate('TASK.deadline', 'not-a-date');
      expect(fb.compile()).toBe('TRUE');
      expect(fb.isEmpty()).toBe(true);
      expect(fb.filters).toHaveLength(4);
    });
  });

  // ---------------------------------------------------------------------------
  // Composition
  // ---------------------------------------------------------------------------
  describe('composition', () => {
    it('joins non-empty filters with AND in append order', () => {
      const fb = FilterBuilder.empty
        .addStatic('TASK.type = 0')
        .addEqual('TASK.area', null)
        .addTruthy('PROJECT.trashed', false)
        .addPrefix('TASK.uuid', 'X');
      expect(fb.compile()).toBe("TASK.type = 0 AND NOT IFNULL(PROJECT.trashed, 0) AND TASK.uuid LIKE 'X%'");
      expect(fb.isEmpty()).toBe(false);
    });

    it('keeps duplicate filters as independent terms', () => {
      const fb = FilterBuilder.empty.addEqual('TAG.title', 'a').addEqual('TAG.title', 'b');
      expect(fb.compile()).toBe("TAG.title = 'a' AND TAG.title = 'b'");
    });

    it('adds prebuilt filters and OR groups', () => {
      const fb = FilterBuilder.empty
        .add(filter.static('TASK.status = 0'))
        .addOr(filter.equal('TASK.project', 'p'), filter.equal('PROJECT_OF_HEADING.uuid', 'p'));
      expect(fb.compile()).toBe("TASK.status = 0 AND (TASK.project = 'p' OR PROJECT_OF_HEADING.uuid = 'p')");
    });

    it('supports every date adder', () => {
      const fb = FilterBuilder.empty
        .addPackedDate('TASK.startDate', 'exists')
        .addUnixTime('TASK.stopDate', 'not-exists')
        .addUnixTimeRange('TASK.creationDate', '1y')
        .addUnixTimeAfter('TASK.creationDate', new Date(1_000_000_000_000))
        .addParsedUnixTime('TASK.stopDate', '>2020-01-01');
      expect(fb.compile()).toBe(
        'TASK.startDate IS NOT NULL AND TASK.stopDate IS NULL AND ' +
          "datetime(TASK.creationDate, 'unixepoch', 'localtime') > datetime('now', '-1 years') AND " +
          'TASK.creationDate > 1000000000 AND ' +
          "date(TASK.stopDate, 'unixepoch', 'localtime') > date('2020-01-01')",
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Immutability
  // ---------------------------------------------------------------------------
  describe('immutability', () => {
    it('never mutates the receiver', () => {
      const base = FilterBuilder.empty.addStatic('a');
      const left = base.addStatic('b');
      const right = base.addStatic('c');
      expect(base.compile()).toBe('a');
      expect(left.compile()).toBe('a AND b');
      expect(right.compile()).toBe('a AND c');
      expect(FilterBuilder.empty.filters).toHaveLength(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Parsing mode
  // ---------------------------------------------------------------------------
  describe('date parsing mode', () => {
    it('ignores malformed dates in permissive mode', () => {
      expect(FilterBuilder.empty.addParsedPackedDate('TASK.deadline', 'soon').compile()).toBe('TRUE');
    });

    it('rejects malformed dates in strict mode', () => {
      expect(() => FilterBuilder.empty.addParsedPackedDate('TASK.deadline', 'soon', 'strict')).toThrow(
        FormatError,
      );
    });
  });
});
