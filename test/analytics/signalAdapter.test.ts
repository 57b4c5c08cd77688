import { describe, expect, it, vi } from 'vitest';
import { SignalAdapter } from '../../src/analytics/signalAdapter';
import type { SignalAdapterSettings } from '../../src/analytics/signalAdapter';
import { DEFAULT_TREND_SETTINGS } from '../../src/analytics/trendSignal';
import { FakeGateway } from '../helpers/fakeGateway';
import { trendingBars } from '../helpers/bars';

const SETTINGS: SignalAdapterSettings = { ...DEFAULT_TREND_SETTINGS, timeframe: '1h', historyLimit: 300 };

describe('SignalAdapter', () => {
  it('seeds the signal on initialize without producing an adjustment', async () => {
    const gateway = new FakeGateway();
    gateway.klines = trendingBars(300, 'up');
    const fetchKlines = vi.spyOn(gateway, 'fetchKlines');
    const adapter = new SignalAdapter(gateway, SETTINGS);

    const signal = await adapter.initialize();

    expect(signal.classification).toBe('strong_up');
    expect(adapter.signal?.classification).toBe('strong_up');
    expect(fetchKlines).toHaveBeenCalledWith('1h', 300);
  });

  it('emits an adjustment only when the classification changes', async () => {
    const gateway = new FakeGateway();
    gateway.klines = trendingBars(300, 'up');
    const adapter = new SignalAdapter(gateway, SETTINGS);
    await adapter.initialize();

    expect(await adapter.refresh()).toBeNull();

    gateway.klines = trendingBars(300, 'down', 1000);
    expect(await adapter.refresh()).toEqual({
      classification: 'strong_down',
      long: { replenish: 2, takeProfit: 2 },
      short: { replenish: 1, takeProfit: 1 },
    });
    expect(await adapter.refresh()).toBeNull();
  });

  it('treats the first refresh without a seeded signal as a change', async () => {
    const gateway = new FakeGateway();
    gateway.klines = trendingBars(10, 'up');
    const adapter = new SignalAdapter(gateway, SETTINGS);

    const adjustment = await adapter.refresh();

    expect(adjustment?.classification).toBe('ranging');
    expect(adapter.signal?.insufficientData).toBe(true);
  });

  it('propagates gateway failures and keeps the previous signal', async () => {
    const gateway = new FakeGateway();
    gateway.klines = trendingBars(300, 'up');
    const adapter = new SignalAdapter(gateway, SETTINGS);
    await adapter.initialize();
    vi.spyOn(gateway, 'fetchKlines').mockRejectedValueOnce(new Error('klines_unavailable'));

    await expect(adapter.refresh()).rejects.toThrow('klines_unavailable');
    expect(adapter.signal?.classification).toBe('strong_up');
  });
});
