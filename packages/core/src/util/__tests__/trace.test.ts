import { afterEach, describe, expect, it, vi } from 'vitest';

import { TRACE_PREFIX, createTracer } from '../trace.js';

describe('createTracer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes lines written to the sink', () => {
    const lines: string[] = [];
    const tracer = createTracer(true, (line) => lines.push(line));

    tracer.write(() => 'push order (depth 1)');

    expect(lines).toEqual([`${TRACE_PREFIX} push order (depth 1)`]);
  });

  it('does not build messages when disabled', () => {
    const build = vi.fn(() => 'never');
    const tracer = createTracer(false, () => undefined);

    tracer.write(build);

    expect(tracer.enabled).toBe(false);
    expect(build).not.toHaveBeenCalled();
  });

  it('writes to stderr by default', () => {
    const write = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);

    createTracer(true).write(() => 'pop order (depth 0)');

    expect(write).toHaveBeenCalledWith('[objectforge] pop order (depth 0)\n');
  });
});
