import { loadConfig } from '../src/config';
import { createHostBridge } from '../src/host';
import { _resetRuntimeSingleton, getRuntime, initRuntime, shutdownRuntime } from '../src/runtime';

const CONFIG = loadConfig({
  engine: {
    name: 'tk-host',
    debugLogging: false,
    watchEvents: ['document-opened'],
  },
  engines: ['tk-host'],
  workspaces: [
    { projectId: 'shotA', root: '/proj/shotA', entityLevels: ['Sequence', 'Shot'] },
  ],
  runtime: { logLevel: 'info' },
});

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => { });
  jest.spyOn(console, 'debug').mockImplementation(() => { });
  _resetRuntimeSingleton();
});

afterEach(() => {
  _resetRuntimeSingleton();
  jest.restoreAllMocks();
});

describe('initRuntime', () => {
  it('should wire and start the coordinator', () => {
    const host = createHostBridge();
    host.setDocumentPath('/proj/shotA/seq01/scene.ma');

    const runtime = initRuntime(CONFIG, host);

    expect(getRuntime()).toBe(runtime);
    expect(runtime.coordinator.getState().kind).toBe('running');
    expect(runtime.coordinator.getContext()).toEqual({
      project: 'shotA',
      entity: { type: 'Sequence', name: 'seq01' },
      task: null,
    });
  });

  it('should watch only the configured document events plus host exit', () => {
    const host = createHostBridge();
    initRuntime(CONFIG, host);

    expect(host.subscriptionCount('document-opened')).toBe(1);
    expect(host.subscriptionCount('document-saved')).toBe(0);
    expect(host.subscriptionCount('host-exiting')).toBe(1);
  });

  it('should route engine queue progress to the shared sink', () => {
    const host = createHostBridge();
    host.setDocumentPath('/proj/shotA/seq01/scene.ma');
    const runtime = initRuntime(CONFIG, host);
    jest.spyOn(console, 'warn').mockImplementation(() => { });

    const engine = runtime.coordinator.getActiveEngine();
    engine?.queue.enqueue('cache', ({ reportProgress }) => { reportProgress(60); }, {});
    engine?.queue.drain();

    expect(runtime.progress.snapshot()).toEqual({ label: 'cache', percent: 60, active: false });
  });

  it('should throw if already initialized', () => {
    initRuntime(CONFIG, createHostBridge());
    expect(() => initRuntime(CONFIG, createHostBridge())).toThrow('Runtime is already initialized');
  });
});

describe('shutdownRuntime', () => {
  it('should stop the coordinator and clear the runtime', () => {
    const host = createHostBridge();
    const runtime = initRuntime(CONFIG, host);

    shutdownRuntime();

    expect(getRuntime()).toBeNull();
    expect(runtime.coordinator.isStopped()).toBe(true);
    expect(host.subscriptionCount()).toBe(0);
  });

  it('should be a no-op when not initialized', () => {
    expect(() => shutdownRuntime()).not.toThrow();
  });
});
