import { describe, expect, it } from '@jest/globals';
import { applyRunOptions, buildProgram } from '../src/cli.js';
import { loadConfig } from '../src/config.js';

describe('cli', () => {
  it('overlays run options on the loaded configuration', () => {
    const base = loadConfig({});

    const config = applyRunOptions(base, { quote: 'tqqq', broker: 'alpaca', pollMs: 250, api: false });

    expect(config.quoteSymbol).toBe('TQQQ');
    expect(config.hedgeSymbol).toBe('SOXS');
    expect(config.broker).toBe('alpaca');
    expect(config.pollIntervalMs).toBe(250);
    expect(config.api.enabled).toBe(false);
    expect(config.api.port).toBe(base.api.port);
  });

  it('keeps the configuration when no options are given', () => {
    const base = loadConfig({ API_ENABLED: 'false' });

    expect(applyRunOptions(base, { api: true })).toEqual(base);
  });

  it('exposes the run command', () => {
    const program = buildProgram();
    const run = program.commands.find((c) => c.name() === 'run');

    expect(run?.options.map((o) => o.long)).toEqual([
      '--quote',
      '--hedge',
      '--broker',
      '--data-source',
      '--interval',
      '--poll-ms',
      '--no-api',
    ]);
  });
});
