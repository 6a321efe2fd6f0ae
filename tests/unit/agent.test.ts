/**
 * Unit tests for Agent
 */

import { Agent } from '../../src/agents/agent';
import { executorFromFunction } from '../../src/agents/executors';
import { Message } from '../../src/models/message';
import { Task } from '../../src/models/task';
import { Gates, sleep, waitFor } from '../helpers/async';

describe('Agent', () => {
  let gates: Gates;
  let agents: Agent[];

  function gatedAgent(
    name: string,
    options: { maxConcurrentTasks?: number; capabilities?: string[] } = {},
  ): Agent {
    const agent = new Agent({
      name,
      capabilities: options.capabilities ?? ['search'],
      maxConcurrentTasks: options.maxConcurrentTasks,
      pollIntervalMs: 5,
      intakeWaitMs: 5,
      executor: executorFromFunction(async (task) => {
        await gates.wait(task.id);
        return `${task.id} done`;
      }),
    });
    agents.push(agent);
    return agent;
  }

  beforeEach(() => {
    gates = new Gates();
    agents = [];
  });

  afterEach(async () => {
    gates.openAll();
    for (const agent of agents) {
      await agent.stop();
      await agent.drain();
    }
  });

  it('should reject a non-positive concurrency cap', () => {
    expect(
      () =>
        new Agent({
          name: 'broken',
          maxConcurrentTasks: 0,
          executor: executorFromFunction(() => null),
        }),
    ).toThrow(RangeError);
  });

  describe('assign', () => {
    it('should refuse a task needing a missing capability', () => {
      const agent = gatedAgent('searcher');
      const task = new Task({ id: 't1', description: 'deploy', requiredCapabilities: ['deploy'] });

      expect(agent.assign(task)).toBe(false);
      expect(task.status).toBe('pending');
      expect(task.assignedAgent).toBeUndefined();
      expect(agent.load).toBe(0);
    });

    it('should refuse work while offline', async () => {
      const agent = gatedAgent('searcher');
      await agent.stop();

      expect(agent.status).toBe('offline');
      expect(agent.assign(new Task({ description: 'anything' }))).toBe(false);
    });

    it('should refuse a task that is not pending', () => {
      const agent = gatedAgent('searcher');
      const task = new Task({ description: 'already running' });
      task.markRunning();

      expect(agent.assign(task)).toBe(false);
    });

    it('should start a task immediately when a slot is free', async () => {
      const agent = gatedAgent('searcher');
      const task = new Task({ id: 't1', description: 'find', requiredCapabilities: ['search'] });

      expect(agent.assign(task)).toBe(true);
      expect(task.status).toBe('running');
      expect(task.assignedAgent).toBe('searcher');
      expect(agent.status).toBe('busy');
      expect(agent.getCurrentTask('t1')).toBe(task);

      gates.open('t1');
      await agent.drain();

      expect(task.status).toBe('completed');
      expect(task.result).toBe('t1 done');
      expect(agent.status).toBe('idle');
      expect(agent.load).toBe(0);

      const snapshot = agent.getStatus();
      expect(snapshot.completedTasks).toBe(1);
      expect(snapshot.metrics.tasksCompleted).toBe(1);
      expect(snapshot.metrics.tasksFailed).toBe(0);
      expect(snapshot.metrics.lastActivity).not.toBeNull();
    });

    it('should queue work beyond the concurrency cap', () => {
      const agent = gatedAgent('searcher');
      const first = new Task({ id: 't1', description: 'first' });
      const second = new Task({ id: 't2', description: 'second' });

      expect(agent.assign(first)).toBe(true);
      expect(agent.assign(second)).toBe(true);

      expect(second.status).toBe('pending');
      expect(second.assignedAgent).toBe('searcher');
      expect(agent.getQueuedTasks()).toEqual([second]);
      expect(agent.getStatus().queuedTasks).toBe(1);
    });
  });

  describe('Concurrency', () => {
    it('should never run more than the cap at once', async () => {
      let active = 0;
      let peak = 0;
      const agent = new Agent({
        name: 'pair',
        maxConcurrentTasks: 2,
        pollIntervalMs: 5,
        intakeWaitMs: 5,
        executor: executorFromFunction(async (task) => {
          active++;
          peak = Math.max(peak, active);
          await gates.wait(task.id);
          active--;
          return task.id;
        }),
      });
      agents.push(agent);
      agent.start();

      const tasks = ['t1', 't2', 't3'].map(
        (id) => new Task({ id, description: id }),
      );
      tasks.forEach((task) => agent.assign(task));

      expect(agent.load).toBe(2);
      expect(tasks[2].status).toBe('pending');

      await sleep(30);
      expect(tasks[2].status).toBe('pending');

      gates.open('t1');
      await waitFor(() => tasks[2].status === 'running');
      expect(agent.load).toBe(2);

      gates.open('t2');
      gates.open('t3');
      await waitFor(() => tasks.every((task) => task.status === 'completed'));

      expect(peak).toBe(2);
      expect(agent.status).toBe('idle');
    });

    it('should skip a queued task cancelled before it starts', async () => {
      const calls: string[] = [];
      const agent = new Agent({
        name: 'solo',
        pollIntervalMs: 5,
        intakeWaitMs: 5,
        executor: executorFromFunction(async (task) => {
          calls.push(task.id);
          await gates.wait(task.id);
          return null;
        }),
      });
      agents.push(agent);
      agent.start();

      const first = new Task({ id: 't1', description: 'first' });
      const second = new Task({ id: 't2', description: 'second' });
      agent.assign(first);
      agent.assign(second);
      second.cancel();

      gates.open('t1');
      await waitFor(() => agent.getQueuedTasks().length === 0);
      await agent.drain();

      expect(calls).toEqual(['t1']);
      expect(second.status).toBe('cancelled');
    });
  });

  describe('Failures', () => {
    it('should mark the agent errored until its load clears', async () => {
      const agent = new Agent({
        name: 'flaky',
        maxConcurrentTasks: 2,
        executor: executorFromFunction(async (task) => {
          await gates.wait(task.id);
          if (task.id === 'bad') {
            throw new Error('boom');
          }
          return 'fine';
        }),
      });
      agents.push(agent);

      const good = new Task({ id: 'good', description: 'good' });
      const bad = new Task({ id: 'bad', description: 'bad' });
      agent.assign(good);
      agent.assign(bad);

      gates.open('bad');
      await waitFor(() => bad.status === 'failed');

      expect(bad.error).toBe('boom');
      expect(agent.status).toBe('error');
      expect(agent.getStatus().metrics.tasksFailed).toBe(1);

      gates.open('good');
      await agent.drain();

      expect(good.status).toBe('completed');
      expect(agent.status).toBe('idle');
    });

    it('should discard an outcome for a task settled elsewhere', async () => {
      const messages: Message[] = [];
      const agent = gatedAgent('late');
      agent.setMessageHandler((message) => messages.push(message));

      const task = new Task({ id: 't1', description: 'slow' });
      agent.assign(task);
      expect(task.fail('Task timeout exceeded')).toBe(true);

      gates.open('t1');
      await agent.drain();

      expect(task.status).toBe('failed');
      expect(task.error).toBe('Task timeout exceeded');
      expect(agent.getStatus().metrics.tasksCompleted).toBe(0);
      expect(agent.getStatus().metrics.tasksFailed).toBe(0);
      expect(messages[1].content).toEqual({
        task_id: 't1',
        success: false,
        error: 'Task timeout exceeded',
      });
    });
  });

  describe('Messaging', () => {
    it('should notify the coordinator on start and on settle', async () => {
      const messages: Message[] = [];
      const agent = new Agent({
        name: 'notifier',
        executor: executorFromFunction(() => 42),
        messageHandler: (message) => messages.push(message),
      });
      agents.push(agent);

      agent.assign(new Task({ id: 't1', description: 'answer' }));
      await agent.drain();

      expect(messages.map((m) => [m.sender, m.recipient, m.type])).toEqual([
        ['notifier', 'system', 'status_update'],
        ['notifier', 'system', 'task_response'],
      ]);
      expect(messages[0].content).toEqual({ task_id: 't1', status: 'running' });
      expect(messages[1].content).toEqual({
        task_id: 't1',
        success: true,
        result: 42,
      });
    });

    it('should address notifications to a bound coordinator', async () => {
      const recipients: string[] = [];
      const agent = new Agent({
        name: 'bound',
        executor: executorFromFunction(() => 'ok'),
      });
      agents.push(agent);
      agent.bindCoordinator({
        name: 'hub',
        handler: (message) => recipients.push(message.recipient),
        pollIntervalMs: 5,
        intakeWaitMs: 5,
      });

      agent.assign(new Task({ description: 'ping' }));
      await agent.drain();

      expect(recipients).toEqual(['hub', 'hub']);
    });

    it('should keep working when the message handler throws', async () => {
      const agent = new Agent({
        name: 'resilient',
        executor: executorFromFunction(() => 'ok'),
        messageHandler: () => {
          throw new Error('handler down');
        },
      });
      agents.push(agent);
      const task = new Task({ description: 'survive' });

      expect(agent.assign(task)).toBe(true);
      await agent.drain();

      expect(task.status).toBe('completed');
    });

    it('should pass inbound messages to onMessage', async () => {
      const received: unknown[] = [];
      const agent = new Agent({
        name: 'listener',
        executor: executorFromFunction(() => null),
        onMessage: (message) => {
          received.push(message.content);
        },
      });
      agents.push(agent);

      await agent.receive(
        new Message({ sender: 'peer', recipient: 'listener', type: 'info', content: 'hello' }),
      );

      expect(received).toEqual(['hello']);
      expect(agent.getStatus().metrics.lastActivity).not.toBeNull();
    });
  });

  describe('Lifecycle', () => {
    it('should let in-flight work finish after stop', async () => {
      const agent = gatedAgent('stopper');
      agent.start();
      const task = new Task({ id: 't1', description: 'long' });
      agent.assign(task);

      await agent.stop();
      expect(agent.status).toBe('offline');
      expect(agent.isRunning).toBe(false);
      expect(task.status).toBe('running');

      gates.open('t1');
      await agent.drain();

      expect(task.status).toBe('completed');
      expect(agent.status).toBe('offline');
    });

    it('should withdraw a queued task', () => {
      const agent = gatedAgent('queue');
      const first = new Task({ id: 't1', description: 'first' });
      const second = new Task({ id: 't2', description: 'second' });
      agent.assign(first);
      agent.assign(second);

      expect(agent.withdraw('t2')).toBe(second);
      expect(agent.withdraw('t1')).toBeUndefined();
      expect(agent.getQueuedTasks()).toEqual([]);
    });
  });
});
