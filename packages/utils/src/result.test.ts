import { describe, it, expect } from 'vitest';
import {
  ok,
  err,
  isOk,
  isErr,
  unwrapOr,
  map,
  mapErr,
  andThen,
  andThenAsync,
  toError,
  tryCatch,
  tryCatchAsync,
  collect,
  type Result,
} from './result.js';

// Typed as the full union so narrowing on assignment does not lose the Ok type
const failure = (error: string): Result<number, string> => err(error);

describe('Result', () => {
  it('builds Ok and Err values', () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 });
    expect(err('boom')).toEqual({ ok: false, error: 'boom' });
  });

  it('narrows with the type guards', () => {
    const good: Result<number, string> = ok(1);
    const bad = failure('no');
    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
    expect(isOk(bad)).toBe(false);
  });

  it('falls back with unwrapOr only on Err', () => {
    const missing = failure('missing');
    expect(unwrapOr(ok(10), 0)).toBe(10);
    expect(unwrapOr(missing, 0)).toBe(0);
  });

  it('maps values and errors independently', () => {
    const doubled = map(ok(5), (x) => x * 2);
    expect(doubled).toEqual({ ok: true, value: 10 });

    const failed = failure('timeout');
    expect(map(failed, (x) => x * 2)).toEqual({ ok: false, error: 'timeout' });
    expect(mapErr(failed, (e) => ({ code: 'SEARCH_FAILED', message: e }))).toEqual({
      ok: false,
      error: { code: 'SEARCH_FAILED', message: 'timeout' },
    });
  });

  it('chains with andThen and stops at the first Err', () => {
    const parsed = andThen(ok('12'), (s) => (/^\d+$/.test(s) ? ok(Number(s)) : err('not a number')));
    expect(parsed).toEqual({ ok: true, value: 12 });

    const rejected = andThen(ok('abc'), (s) => (/^\d+$/.test(s) ? ok(Number(s)) : err('not a number')));
    expect(rejected).toEqual({ ok: false, error: 'not a number' });
  });

  it('chains async steps', async () => {
    const chained = await andThenAsync(ok(3), async (x) => ok(x + 1));
    expect(chained).toEqual({ ok: true, value: 4 });

    const first = failure('first');
    const skipped = await andThenAsync(first, async (x) => ok(x + 1));
    expect(skipped).toEqual({ ok: false, error: 'first' });
  });

  it('captures thrown values through the mapper', async () => {
    const sync = tryCatch(
      () => JSON.parse('{not json'),
      (thrown) => toError(thrown).name
    );
    expect(sync).toEqual({ ok: false, error: 'SyntaxError' });

    const rejected = await tryCatchAsync(
      () => Promise.reject('plain string'),
      (thrown) => toError(thrown).message
    );
    expect(rejected).toEqual({ ok: false, error: 'plain string' });

    const resolved = await tryCatchAsync(async () => 'fine', toError);
    expect(resolved).toEqual({ ok: true, value: 'fine' });
  });

  it('collects a list of results', () => {
    expect(collect([ok(1), ok(2)])).toEqual({ ok: true, value: [1, 2] });
    expect(collect<number, string>([ok(1), err('second'), err('third')])).toEqual({
      ok: false,
      error: 'second',
    });
  });
});
