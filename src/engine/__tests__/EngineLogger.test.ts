import { afterEach, describe, it, expect, vi } from 'vitest';
import { consoleLogger, makeEngineEvent, silentLogger } from '../logging/engineLogger';

describe('engineLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('makeEngineEvent stamps the current time', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    expect(makeEngineEvent('sizing', 'method_selected', { method: 'area_product' })).toEqual({
      event_type: 'method_selected',
      timestamp: '2026-03-01T12:00:00.000Z',
      stage: 'sizing',
      payload: { method: 'area_product' },
    });
  });

  it('consoleLogger writes one JSON line per event at the matching level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const event = {
      event_type: 'no_match',
      timestamp: '2026-03-01T12:00:00.000Z',
      stage: 'candidates' as const,
      payload: { requiredApCm4: 1.9 },
    };

    consoleLogger.info(event);
    consoleLogger.warn({ ...event, event_type: 'external_source_unavailable' });
    consoleLogger.debug({ ...event, stage: 'validation', event_type: 'check_skipped' });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith(
      '{"event_type":"no_match","timestamp":"2026-03-01T12:00:00.000Z","stage":"candidates","payload":{"requiredApCm4":1.9}}',
    );
    expect(warn).toHaveBeenCalledWith(JSON.stringify({ ...event, event_type: 'external_source_unavailable' }));
    expect(debug).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(debug.mock.calls[0][0]))).toEqual({
      ...event,
      stage: 'validation',
      event_type: 'check_skipped',
    });
  });

  it('silentLogger writes nothing', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    silentLogger.info(makeEngineEvent('winding', 'wire_selected', {}));
    expect(info).not.toHaveBeenCalled();
  });
});
