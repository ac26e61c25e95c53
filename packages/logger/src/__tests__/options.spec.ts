import { RequestMethod } from '@nestjs/common';
import { describe, expect, it } from 'vitest';
import { createLoggerOptions, developmentTarget, productionTarget } from '../options';

describe('createLoggerOptions', () => {
  it('writes plain JSON to stdout in production', () => {
    const options = createLoggerOptions('production');

    expect(options.renameContext).toBeUndefined();
    expect(options.pinoHttp).toMatchObject({ transport: productionTarget });
  });

  it('pretty prints and renames the context outside production', () => {
    const options = createLoggerOptions('development');

    expect(options.renameContext).toBe('caller');
    expect(options.pinoHttp).toMatchObject({ transport: developmentTarget });
  });

  it('redacts credentials and continuation cursors from request logs', () => {
    const options = createLoggerOptions('production');

    expect(options.pinoHttp).toMatchObject({
      redact: {
        paths: expect.arrayContaining(['req.headers.authorization', 'req.query.pageCursor']),
      },
    });
  });

  it('skips health probes', () => {
    const options = createLoggerOptions('production');

    expect(options.exclude).toEqual([
      { method: RequestMethod.GET, path: 'probe' },
    ]);
  });
});
