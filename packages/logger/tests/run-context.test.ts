import { describe, it, expect } from 'vitest';
import { annotateRun, getRunContext, getRunId, withRunContext } from '../src/run-context.js';

describe('run context', () => {
  it('should be empty outside of a run', () => {
    expect(getRunId()).toBeUndefined();
    expect(getRunContext()).toBeUndefined();
    expect(annotateRun({ symbol: 'AAPL' })).toBe(false);
  });

  it('should propagate across awaits', async () => {
    const seen = await withRunContext(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return getRunId();
    }, 'run-abc');

    expect(seen).toBe('run-abc');
  });

  it('should generate a UUID v4 when no id is given', async () => {
    const [a, b] = await Promise.all([withRunContext(() => getRunId()), withRunContext(() => getRunId())]);

    expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(a).not.toBe(b);
  });

  it('should carry fields and accept annotations, but not a new run_id', async () => {
    const context = await withRunContext(
      () => {
        annotateRun({ provider: 'fixture', run_id: 'hijacked' });
        return getRunContext();
      },
      'run-1',
      { symbol: 'AAPL' }
    );

    expect(context).toEqual({ run_id: 'run-1', symbol: 'AAPL', provider: 'fixture' });
  });

  it('should keep an outer id when a nested run passes it on', async () => {
    const inner = await withRunContext(
      () => withRunContext(() => getRunContext(), getRunId(), { timeframe: '1D' }),
      'outer'
    );

    expect(inner).toEqual({ run_id: 'outer', timeframe: '1D' });
  });

  it('should isolate concurrent runs', async () => {
    const [a, b] = await Promise.all([
      withRunContext(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return getRunId();
      }, 'a'),
      withRunContext(async () => getRunId(), 'b'),
    ]);

    expect([a, b]).toEqual(['a', 'b']);
  });
});
