import { describe, expect, it } from 'vitest';
import {
  DuplicateSectionError,
  MissingRecommendationError,
  ReportSealedError,
  SectionClosedError,
  UnknownSectionError,
  VerdictMismatchError,
} from '../src/engine/errors.js';
import { createCheckItem, ReportBuilder } from '../src/engine/report.js';
import { renderHtml } from '../src/reporters/html.js';
import { emptyCounters } from '../src/engine/aggregator.js';
import { fixedClock, METADATA, verdictFor } from './fixtures.js';

const builder = () => new ReportBuilder(METADATA, fixedClock);

describe('createCheckItem', () => {
  it('drops the recommendation on pass and info items', () => {
    const item = createCheckItem({ title: 'A', outcome: 'pass', details: 'ok', recommendation: 'x' });
    expect(item).toEqual({ title: 'A', outcome: 'pass', details: 'ok', recommendationExpected: true });
    expect(createCheckItem({ title: 'B', outcome: 'info', details: '', recommendation: 'x' }).recommendation)
      .toBeUndefined();
  });

  it('keeps a trimmed recommendation on other outcomes', () => {
    const item = createCheckItem({ title: 'A', outcome: 'fail', details: '', recommendation: '  Fix it ' });
    expect(item.recommendation).toBe('Fix it');
    expect(createCheckItem({ title: 'B', outcome: 'warning', details: '', recommendation: '   ' }).recommendation)
      .toBeUndefined();
  });

  it('freezes the item', () => {
    expect(Object.isFrozen(createCheckItem({ title: 'A', outcome: 'pass', details: '' }))).toBe(true);
  });
});

describe('ReportBuilder', () => {
  it('keeps sections and items in insertion order', () => {
    const report = builder();
    report.openSection('b', 'Second opened first');
    report.openSection('a', 'Then this one');
    report.appendItem('a', createCheckItem({ title: 'a1', outcome: 'pass', details: '' }));
    report.appendItem('b', createCheckItem({ title: 'b1', outcome: 'pass', details: '' }));
    report.appendItem('a', createCheckItem({ title: 'a2', outcome: 'pass', details: '' }));

    const view = report.view();
    expect(view.map((s) => s.id)).toEqual(['b', 'a']);
    expect(view[1]?.items.map((i) => i.title)).toEqual(['a1', 'a2']);
  });

  it('rejects appends to a closed section every time', () => {
    const report = builder();
    report.openSection('net', 'Network');
    report.closeSection('net');
    const item = createCheckItem({ title: 'late', outcome: 'pass', details: '' });

    expect(() => report.appendItem('net', item)).toThrow(SectionClosedError);
    expect(() => report.appendItem('net', item)).toThrow(
      'Section "net" is closed; no further items can be appended',
    );
    expect(report.view()[0]?.items).toHaveLength(0);
  });

  it('rejects unknown and duplicate sections', () => {
    const report = builder();
    report.openSection('net', 'Network');
    expect(() => report.openSection('net', 'Again')).toThrow(DuplicateSectionError);
    expect(() => report.appendItem('nope', createCheckItem({ title: 'x', outcome: 'pass', details: '' })))
      .toThrow(UnknownSectionError);
    expect(() => report.closeSection('nope')).toThrow('No section with id "nope"');
  });

  it('tallies section counters only for items appended with a verdict', () => {
    const report = builder();
    report.openSection('net', 'Network');
    report.appendItem('net', createCheckItem({ title: 'a', outcome: 'pass', details: '' }), verdictFor('pass'));
    report.appendItem('net', createCheckItem({ title: 'summary', outcome: 'pass', details: '' }));
    expect(report.view()[0]?.counters).toEqual({ ...emptyCounters(), total: 1, passed: 1 });
  });

  it('rejects an item whose outcome disagrees with its verdict', () => {
    const report = builder();
    report.openSection('net', 'Network');
    const append = () =>
      report.appendItem('net', createCheckItem({ title: 'a', outcome: 'pass', details: '' }), verdictFor('fail'));
    expect(append).toThrow(VerdictMismatchError);
    expect(append).toThrow('Item "a" is pass but its verdict is fail');
    expect(report.view()[0]?.items).toHaveLength(0);
  });

  it('lists open sections', () => {
    const report = builder();
    report.openSection('a', 'A');
    report.openSection('b', 'B');
    report.closeSection('a');
    expect(report.openSectionIds()).toEqual(['b']);
  });

  describe('finalize', () => {
    it('closes open sections and seals the report', () => {
      const report = builder();
      report.openSection('net', 'Network');
      const result = report.finalize({ ...emptyCounters(), total: 1, passed: 1 });

      expect(report.sealed).toBe(true);
      expect(result.sections[0]?.closed).toBe(true);
      expect(result.percentage).toBe(100);
      expect(result.finalizedAt).toBe('2025-03-01T14:05:02.000Z');
      expect(() => report.openSection('late', 'Late')).toThrow(ReportSealedError);
      expect(() =>
        report.appendItem('net', createCheckItem({ title: 'x', outcome: 'pass', details: '' })),
      ).toThrow('Report is finalized; cannot append to section "net"');
    });

    it('returns the first snapshot on a second call', () => {
      const report = builder();
      report.openSection('net', 'Network');
      report.appendItem('net', createCheckItem({ title: 'a', outcome: 'fail', details: 'd', recommendation: 'r' }));
      const first = report.finalize({ ...emptyCounters(), total: 1, failed: 1 });
      const second = report.finalize({ ...emptyCounters(), total: 7, passed: 7 });

      expect(second).toBe(first);
      expect(second.counters).toEqual({ ...emptyCounters(), total: 1, failed: 1 });
      expect(renderHtml(second)).toBe(renderHtml(first));
    });

    it('refuses to seal fail or warning items without a recommendation', () => {
      const report = builder();
      report.openSection('net', 'Network');
      report.appendItem('net', createCheckItem({ title: 'Open ports', outcome: 'fail', details: '' }));
      report.appendItem('net', createCheckItem({ title: 'Unclear', outcome: 'warning', details: '' }));

      expect(() => report.finalize(emptyCounters())).toThrow(MissingRecommendationError);
      expect(() => report.finalize(emptyCounters())).toThrow(
        'Items without a recommendation: "Open ports", "Unclear"',
      );
      expect(report.sealed).toBe(false);
    });

    it('allows a missing recommendation when the check does not expect one', () => {
      const report = builder();
      report.openSection('net', 'Network');
      report.appendItem(
        'net',
        createCheckItem({ title: 'a', outcome: 'fail', details: '', recommendationExpected: false }),
      );
      expect(report.finalize(emptyCounters()).sections[0]?.items).toHaveLength(1);
    });
  });
});
