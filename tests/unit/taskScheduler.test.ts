/**
 * Unit tests for TaskScheduler
 */

import { Task } from '../../src/models/task';
import { TaskScheduler } from '../../src/services/taskScheduler';

const ANY = new Set<string>(['search', 'write', 'review']);

function makeTask(
  id: string,
  overrides: Partial<ConstructorParameters<typeof Task>[0]> = {},
): Task {
  return new Task({
    id,
    description: `task ${id}`,
    createdAt: new Date(1_000),
    ...overrides,
  });
}

function runTo(task: Task, outcome: 'completed' | 'failed'): void {
  task.markRunning();
  if (outcome === 'completed') {
    task.complete('ok');
  } else {
    task.fail('broken');
  }
}

describe('TaskScheduler', () => {
  let scheduler: TaskScheduler;

  beforeEach(() => {
    scheduler = new TaskScheduler();
  });

  describe('Ordering', () => {
    it('should hand out higher priority tasks first', () => {
      scheduler.add(makeTask('low', { priority: 'low' }));
      scheduler.add(makeTask('high', { priority: 'high' }));
      scheduler.add(makeTask('medium', { priority: 'medium' }));
      scheduler.add(makeTask('critical', { priority: 'critical' }));

      const order = [1, 2, 3, 4].map(() => scheduler.next(ANY)?.id);

      expect(order).toEqual(['critical', 'high', 'medium', 'low']);
      expect(scheduler.next(ANY)).toBeNull();
    });

    it('should break priority ties by creation time', () => {
      scheduler.add(makeTask('later', { createdAt: new Date(3_000) }));
      scheduler.add(makeTask('earliest', { createdAt: new Date(1_000) }));
      scheduler.add(makeTask('middle', { createdAt: new Date(2_000) }));

      expect(scheduler.getPendingTasks().map((t) => t.id)).toEqual([
        'earliest',
        'middle',
        'later',
      ]);
    });

    it('should keep insertion order for identical timestamps', () => {
      scheduler.add(makeTask('first'));
      scheduler.add(makeTask('second'));
      scheduler.add(makeTask('third'));

      expect(scheduler.getPendingTasks().map((t) => t.id)).toEqual([
        'first',
        'second',
        'third',
      ]);
    });
  });

  describe('next', () => {
    it('should skip tasks whose dependencies are not completed', () => {
      const parent = makeTask('parent', { priority: 'low' });
      scheduler.add(makeTask('child', { priority: 'critical', dependencies: ['parent'] }));
      scheduler.add(parent);

      expect(scheduler.next(ANY)?.id).toBe('parent');
      expect(scheduler.next(ANY)).toBeNull();

      runTo(parent, 'completed');
      scheduler.update(parent);

      expect(scheduler.next(ANY)?.id).toBe('child');
    });

    it('should not release dependents of a failed task', () => {
      const parent = makeTask('parent');
      scheduler.add(makeTask('child', { dependencies: ['parent'] }));
      scheduler.add(parent);

      scheduler.next(ANY);
      runTo(parent, 'failed');
      scheduler.update(parent);

      expect(scheduler.next(ANY)).toBeNull();
      expect(scheduler.getPendingTasks().map((t) => t.id)).toEqual(['child']);
    });

    it('should skip tasks the caller lacks capabilities for', () => {
      scheduler.add(makeTask('needs-deploy', { priority: 'high', requiredCapabilities: ['deploy'] }));
      scheduler.add(makeTask('needs-search', { requiredCapabilities: ['search'] }));

      expect(scheduler.next(new Set(['search']))?.id).toBe('needs-search');
      expect(scheduler.next(new Set(['search']))).toBeNull();
      expect(scheduler.getPendingTasks().map((t) => t.id)).toEqual(['needs-deploy']);
    });

    it('should never return the same task twice', () => {
      scheduler.add(makeTask('only'));

      expect(scheduler.next(ANY)?.id).toBe('only');
      expect(scheduler.next(ANY)).toBeNull();
    });

    it('should hand a re-added task out again', () => {
      const task = makeTask('returned');
      scheduler.add(task);

      scheduler.next(ANY);
      scheduler.add(task);

      expect(scheduler.next(ANY)).toBe(task);
    });
  });

  describe('update', () => {
    it('should move a task between partitions by status', () => {
      const task = makeTask('t1');
      scheduler.add(task);
      scheduler.next(ANY);

      task.markRunning();
      scheduler.update(task);
      expect(scheduler.getRunningTask('t1')).toBe(task);

      task.complete('done');
      scheduler.update(task);
      expect(scheduler.getRunningTask('t1')).toBeUndefined();
      expect(scheduler.getCompletedTask('t1')).toBe(task);
      expect(scheduler.getCompletedTaskIds()).toEqual(new Set(['t1']));
    });

    it('should be idempotent', () => {
      const task = makeTask('t1');
      runTo(task, 'failed');

      scheduler.update(task);
      scheduler.update(task);

      expect(scheduler.getFailedTask('t1')).toBe(task);
      expect(scheduler.getStats()).toEqual({
        pendingTasks: 0,
        runningTasks: 0,
        completedTasks: 0,
        failedTasks: 1,
        cancelledTasks: 0,
      });
    });
  });

  describe('cancel', () => {
    it('should cancel a pending task', () => {
      scheduler.add(makeTask('t1'));

      const cancelled = scheduler.cancel('t1');

      expect(cancelled?.status).toBe('cancelled');
      expect(scheduler.getPendingTasks()).toEqual([]);
      expect(scheduler.getTask('t1')).toBe(cancelled);
    });

    it('should cancel a running task', () => {
      const task = makeTask('t1');
      task.markRunning();
      scheduler.update(task);

      expect(scheduler.cancel('t1')).toBe(task);
      expect(scheduler.getRunningTasks()).toEqual([]);
      expect(scheduler.getStats().cancelledTasks).toBe(1);
    });

    it('should ignore finished and unknown tasks', () => {
      const task = makeTask('t1');
      runTo(task, 'completed');
      scheduler.update(task);

      expect(scheduler.cancel('t1')).toBeNull();
      expect(scheduler.cancel('missing')).toBeNull();
      expect(task.status).toBe('completed');
    });
  });

  describe('listTasks', () => {
    beforeEach(() => {
      scheduler.add(makeTask('p-low', { priority: 'low' }));
      scheduler.add(makeTask('p-high', { priority: 'high' }));

      const running = makeTask('r1', { priority: 'high' });
      running.assignedAgent = 'worker';
      running.markRunning();
      scheduler.update(running);

      const done = makeTask('c1');
      done.assignedAgent = 'worker';
      runTo(done, 'completed');
      scheduler.update(done);
    });

    it('should list pending tasks first, then the partitions', () => {
      expect(scheduler.listTasks().map((t) => t.id)).toEqual([
        'p-high',
        'p-low',
        'r1',
        'c1',
      ]);
    });

    it('should filter by status, priority and agent', () => {
      expect(scheduler.listTasks({ status: 'pending' }).map((t) => t.id)).toEqual([
        'p-high',
        'p-low',
      ]);
      expect(scheduler.listTasks({ priority: 'high' }).map((t) => t.id)).toEqual([
        'p-high',
        'r1',
      ]);
      expect(
        scheduler.listTasks({ assignedAgent: 'worker' }).map((t) => t.id),
      ).toEqual(['r1', 'c1']);
    });

    it('should page with offset and limit', () => {
      expect(
        scheduler.listTasks({ offset: 1, limit: 2 }).map((t) => t.id),
      ).toEqual(['p-low', 'r1']);
    });
  });

  it('should report partition sizes', () => {
    scheduler.add(makeTask('a'));
    scheduler.add(makeTask('b'));
    const c = makeTask('c');
    runTo(c, 'completed');
    scheduler.update(c);

    expect(scheduler.getStats()).toEqual({
      pendingTasks: 2,
      runningTasks: 0,
      completedTasks: 1,
      failedTasks: 0,
      cancelledTasks: 0,
    });
    expect(scheduler.has('a')).toBe(true);
    expect(scheduler.has('c')).toBe(true);
    expect(scheduler.has('z')).toBe(false);
  });
});
