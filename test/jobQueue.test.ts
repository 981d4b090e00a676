import { createJobQueue, createTrackingProgressSink, type ProgressSink } from '../src/queue';

interface RecordingSink extends ProgressSink {
  events: string[];
}

function createRecordingSink(): RecordingSink {
  const events: string[] = [];
  return {
    events,
    beginProgress: (label) => { events.push(`begin:${label}`); },
    step: (delta) => { events.push(`step:${delta}`); },
    endProgress: () => { events.push('end'); },
  };
}

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => { });
  jest.spyOn(console, 'error').mockImplementation(() => { });
  jest.spyOn(console, 'debug').mockImplementation(() => { });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('enqueue', () => {
  it('should append without running anything', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    const action = jest.fn();

    queue.enqueue('first', action, {});
    queue.enqueue('second', action, {});

    expect(queue.size()).toBe(2);
    expect(queue.pendingNames()).toEqual(['first', 'second']);
    expect(action).not.toHaveBeenCalled();
  });

  it('should not deduplicate', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    queue.enqueue('same', () => { }, {});
    queue.enqueue('same', () => { }, {});
    expect(queue.pendingNames()).toEqual(['same', 'same']);
  });

  it('should warn that the queue is deprecated', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    queue.enqueue('job', () => { }, {});
    expect(console.warn).toHaveBeenCalledWith(
      '[JobQueue] The engine job queue is deprecated and will be removed in a future release.'
    );
  });
});

describe('drain', () => {
  it('should run jobs in FIFO order with their arguments', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    const seen: string[] = [];

    queue.enqueue('a', ({ label }: { label: string }) => { seen.push(label); }, { label: 'one' });
    queue.enqueue('b', ({ label }: { label: string }) => { seen.push(label); }, { label: 'two' });

    expect(queue.drain()).toEqual({ executed: 2, failed: [] });
    expect(seen).toEqual(['one', 'two']);
    expect(queue.size()).toBe(0);
  });

  it('should inject reportProgress and relay deltas', () => {
    const sink = createRecordingSink();
    const queue = createJobQueue({ progress: sink });

    queue.enqueue('export', ({ reportProgress }) => {
      reportProgress(10);
      reportProgress(40);
      reportProgress(100);
    }, {});
    queue.drain();

    expect(sink.events).toEqual(['begin:export', 'step:10', 'step:30', 'step:60', 'end']);
  });

  it('should reset progress for each job', () => {
    const sink = createRecordingSink();
    const queue = createJobQueue({ progress: sink });

    queue.enqueue('a', ({ reportProgress }) => { reportProgress(50); }, {});
    queue.enqueue('b', ({ reportProgress }) => { reportProgress(25); }, {});
    queue.drain();

    expect(sink.events).toEqual(['begin:a', 'step:50', 'end', 'begin:b', 'step:25', 'end']);
  });

  it('should override a caller-supplied reportProgress argument', () => {
    const sink = createRecordingSink();
    const queue = createJobQueue({ progress: sink });
    const impostor = jest.fn();

    queue.enqueue('job', (args) => { args.reportProgress(5); }, { reportProgress: impostor });
    queue.drain();

    expect(impostor).not.toHaveBeenCalled();
    expect(sink.events).toContain('step:5');
  });

  it('should finish each job, including its end signal, before the next starts even if it throws', () => {
    const sink = createRecordingSink();
    const queue = createJobQueue({ progress: sink });

    queue.enqueue('j1', () => {
      sink.events.push('run:j1');
      throw new Error('j1 failed');
    }, {});
    queue.enqueue('j2', () => { sink.events.push('run:j2'); }, {});
    queue.drain();

    expect(sink.events).toEqual(['begin:j1', 'run:j1', 'end', 'begin:j2', 'run:j2', 'end']);
  });

  it('should run every other job when one fails and end progress once per job', () => {
    const sink = createRecordingSink();
    const queue = createJobQueue({ progress: sink });
    const job1 = jest.fn();
    const job3 = jest.fn();

    queue.enqueue('job 1', job1, {});
    queue.enqueue('job 2', () => {
      throw new Error('disk full');
    }, {});
    queue.enqueue('job 3', job3, {});

    const summary = queue.drain();

    expect(job1).toHaveBeenCalledTimes(1);
    expect(job3).toHaveBeenCalledTimes(1);
    expect(summary).toEqual({ executed: 3, failed: ['job 2'] });
    expect(sink.events.filter((e) => e === 'end')).toHaveLength(3);
    expect(sink.events).toEqual([
      'begin:job 1', 'end',
      'begin:job 2', 'end',
      'begin:job 3', 'end',
    ]);
  });

  it('should log a failing job with its name and argument keys', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    const failure = new Error('disk full');

    queue.enqueue('publish', () => {
      throw failure;
    }, { path: '/proj/shotA/scene.ma' });
    queue.drain();

    expect(console.error).toHaveBeenCalledWith(
      '[JobQueue] Job "publish" failed: disk full (args: path)',
      failure
    );
  });

  it('should keep draining when the progress sink fails to end', () => {
    const sink = createRecordingSink();
    sink.endProgress = () => {
      throw new Error('progress bar gone');
    };
    const queue = createJobQueue({ progress: sink });
    const second = jest.fn();

    queue.enqueue('first', () => { }, {});
    queue.enqueue('second', second, {});

    expect(() => queue.drain()).not.toThrow();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should pick up jobs enqueued while draining', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    const order: string[] = [];

    queue.enqueue('parent', () => {
      order.push('parent');
      queue.enqueue('child', () => { order.push('child'); }, {});
    }, {});

    expect(queue.drain().executed).toBe(2);
    expect(order).toEqual(['parent', 'child']);
  });

  it('should return an empty summary for an empty queue', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    expect(queue.drain()).toEqual({ executed: 0, failed: [] });
  });

  it('should warn on every drain', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    queue.drain();
    queue.drain();
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});

describe('clear', () => {
  it('should drop pending jobs and report how many', () => {
    const queue = createJobQueue({ progress: createRecordingSink() });
    const action = jest.fn();
    queue.enqueue('a', action, {});
    queue.enqueue('b', action, {});

    expect(queue.clear()).toBe(2);
    expect(queue.size()).toBe(0);
    queue.drain();
    expect(action).not.toHaveBeenCalled();
  });
});

describe('createTrackingProgressSink', () => {
  it('should track label, percent and activity', () => {
    const sink = createTrackingProgressSink();
    expect(sink.snapshot()).toEqual({ label: null, percent: 0, active: false });

    sink.beginProgress('export');
    sink.step(30);
    sink.step(20);
    expect(sink.snapshot()).toEqual({ label: 'export', percent: 50, active: true });

    sink.endProgress();
    expect(sink.snapshot()).toEqual({ label: 'export', percent: 50, active: false });
  });

  it('should clamp percent between 0 and 100', () => {
    const sink = createTrackingProgressSink();
    sink.beginProgress('job');
    sink.step(150);
    expect(sink.snapshot().percent).toBe(100);
    sink.step(-300);
    expect(sink.snapshot().percent).toBe(0);
  });

  it('should feed queue progress into the snapshot', () => {
    const sink = createTrackingProgressSink();
    const queue = createJobQueue({ progress: sink });
    queue.enqueue('bake', ({ reportProgress }) => { reportProgress(75); }, {});
    queue.drain();

    expect(sink.snapshot()).toEqual({ label: 'bake', percent: 75, active: false });
  });
});
