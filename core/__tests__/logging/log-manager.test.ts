import { LogManager } from '../../logging/log-manager';
import type { ILogAdapter, LogEntry } from '../../logging/types';
import { logger } from '../../../utils/logging/logger';
import type { LoggedEvent } from '../../../utils/logging/logger';
import { resetDebugFlags, setDebugFlag } from '../../../utils/logging/debugFlags';

class RecordingAdapter implements ILogAdapter {
  readonly entries: LogEntry[] = [];

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
  }
}

describe('LogManager', () => {
  const manager = LogManager.getInstance();
  let adapter: RecordingAdapter;

  beforeEach(() => {
    adapter = new RecordingAdapter();
    manager.setAdapters([adapter]);
    manager.clearLogs();
    manager.clearFilters();
    resetDebugFlags();
  });

  it('should be a singleton', () => {
    expect(LogManager.getInstance()).toBe(manager);
    expect(LogManager.getInstance().getInstanceId()).toBe(manager.getInstanceId());
  });

  it('should stay quiet under test by default', async () => {
    await logger.info('Login successful', undefined, { source: 'SessionController' });
    expect(manager.getLogs()).toEqual([]);
    expect(adapter.entries).toEqual([]);
  });

  it('should honour per-source levels', async () => {
    manager.setComponentLogLevel('FetchOrchestrator', 'info');

    await logger.debug('Page received', { page: 1 }, { source: 'FetchOrchestrator' });
    await logger.info('Fetch complete', { totalFetched: 10 }, { source: 'FetchOrchestrator' });
    await logger.info('Login successful', undefined, { source: 'SessionController' });

    expect(adapter.entries.map(entry => [entry.level, entry.source, entry.message])).toEqual([
      ['info', 'FetchOrchestrator', 'Fetch complete']
    ]);
    expect(manager.getComponentFilters()).toEqual([['FetchOrchestrator', 'info']]);
  });

  it('should let a debug flag open a source up', async () => {
    setDebugFlag('ImportService', true);
    await logger.debug('Import starting', undefined, { source: 'ImportService' });
    expect(adapter.entries).toHaveLength(1);
  });

  it('should rate limit noisy messages', async () => {
    manager.setComponentLogLevel('RequestGateway', 'debug');

    await logger.debug('Request registered', { id: 'a' }, { source: 'RequestGateway' });
    await logger.debug('Request registered', { id: 'b' }, { source: 'RequestGateway' });

    expect(manager.getLogs()).toHaveLength(1);
  });

  it('should redact token material', () => {
    const text = manager.safeStringify({ accessToken: 'test-secret', nested: { password: 'test-password', kind: 'Holes' } }, 0);
    expect(text).toBe('{"accessToken":"[Redacted]","nested":{"password":"[Redacted]","kind":"Holes"}}');
  });

  it('should survive circular data', () => {
    const data: Record<string, unknown> = { name: 'loop' };
    data.self = data;
    expect(manager.safeStringify(data, 0)).toBe('{"name":"loop","self":"[Circular]"}');
  });

  it('should summarise long arrays', () => {
    expect(manager.safeStringify({ rows: Array.from({ length: 50 }, () => 1) }, 0)).toBe('{"rows":"[Array(50)]"}');
  });

  it('should export the retained history', async () => {
    manager.setComponentLogLevel('ImporterController', 'warn');
    await logger.warn('Rejected fetch filters', { kind: 'Assays' }, { source: 'ImporterController' });

    const report = manager.exportLogs();
    expect(report.startsWith('=== Mining Data Importer Logs ===')).toBe(true);
    expect(report).toContain('Total Logs: 1');
    expect(report.endsWith('[warn] [ImporterController] Rejected fetch filters {"kind":"Assays"}')).toBe(true);
  });

  it('should notify log listeners', async () => {
    const seen: LoggedEvent[] = [];
    const remove = logger.addLogListener(event => seen.push(event));

    await logger.error('Fetch failed', 'boom', { source: 'FetchOrchestrator' });
    remove();
    await logger.error('Fetch failed', 'again', { source: 'FetchOrchestrator' });

    expect(seen).toHaveLength(1);
    expect(seen[0]).toEqual(expect.objectContaining({ level: 'error', source: 'FetchOrchestrator', data: { value: 'boom' } }));
  });
});
