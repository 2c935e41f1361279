import { describe, it, expect } from 'vitest';
import { accumulateQuantity, findLatestFill } from '../../services/claim-history.service.js';
import { DRUGS, fill } from '../helpers/fixtures.js';

const { sumatriptan, omeprazole } = DRUGS;

describe('accumulateQuantity', () => {
  it('returns zero for an empty history', () => {
    expect(accumulateQuantity([], sumatriptan.ndc, 30, '2026-03-15')).toBe(0);
  });

  it('includes fills on both window bounds', () => {
    const history = [
      fill(sumatriptan, '2026-02-13', 3), // asOf - 30
      fill(sumatriptan, '2026-03-15', 2), // asOf
    ];
    expect(accumulateQuantity(history, sumatriptan.ndc, 30, '2026-03-15')).toBe(5);
  });

  it('excludes fills before the window, after the as-of date and for other drugs', () => {
    const history = [
      fill(sumatriptan, '2026-02-12', 4),
      fill(sumatriptan, '2026-03-16', 4),
      fill(omeprazole, '2026-03-01', 30),
      fill(sumatriptan, '2026-03-05', 6),
    ];
    expect(accumulateQuantity(history, sumatriptan.ndc, 30, '2026-03-15')).toBe(6);
  });
});

describe('findLatestFill', () => {
  it('picks the most recent fill of the same code on or before the date', () => {
    const history = [
      fill(omeprazole, '2026-01-10', 30),
      fill(omeprazole, '2026-02-09', 30),
      fill(omeprazole, '2026-03-20', 30),
      fill(sumatriptan, '2026-03-01', 9),
    ];
    expect(findLatestFill(history, omeprazole.ndc, '2026-03-15')?.serviceDate).toBe('2026-02-09');
  });

  it('returns undefined without a prior fill', () => {
    expect(findLatestFill([fill(sumatriptan, '2026-03-01', 9)], omeprazole.ndc, '2026-03-15')).toBeUndefined();
  });
});
