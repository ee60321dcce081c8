/**
 * Tests unitarios para core/engines/ConcurrencyController.ts y core/engines/ConcurrencyCoordinator.ts
 */
import { ConcurrencyController } from '../../core/engines/ConcurrencyController';
import { ConcurrencyCoordinator, dispatchOrder } from '../../core/engines/ConcurrencyCoordinator';
import type { TaskWorker } from '../../core/engines/ConcurrencyCoordinator';
import type { TaskResult, TaskStatusValue, TransferTask } from '../../core/engines/types';

function makeTask(identifier: string, overrides: Partial<TransferTask> = {}): TransferTask {
  return {
    identifier,
    destinationPath: `/tmp/out/${identifier}.txt`,
    canonicalPath: `files/${identifier}.txt`,
    expectedSize: null,
    bytesTransferred: 0,
    status: 'pending',
    attemptCount: 0,
    lastMirrorTried: null,
    priority: 0,
    submissionIndex: 0,
    candidateMirrors: null,
    ...overrides,
  };
}

function makeTasks(count: number): TransferTask[] {
  return Array.from({ length: count }, (_, i) => makeTask(`t${i}`, { submissionIndex: i }));
}

function completedResult(task: TransferTask): TaskResult {
  return {
    status: 'completed',
    identifier: task.identifier,
    destinationPath: task.destinationPath,
    bytesTransferred: 10,
    attempts: 1,
    mirror: 'alpha',
    skipped: false,
  };
}

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('ConcurrencyController', () => {
  it('debe limitar los slots con tryAcquire', () => {
    const controller = new ConcurrencyController({ maxConcurrent: 2 });
    expect(controller.tryAcquire()).toBe(true);
    expect(controller.tryAcquire()).toBe(true);
    expect(controller.tryAcquire()).toBe(false);
    expect(controller.getActiveCount()).toBe(2);
    expect(controller.getAvailableSlots()).toBe(0);
  });

  it('debe usar 3 por defecto y nunca menos de 1', () => {
    expect(new ConcurrencyController().maxConcurrent).toBe(3);
    expect(new ConcurrencyController({ maxConcurrent: 0 }).maxConcurrent).toBe(1);
  });

  it('debe ceder los slots a los waiters en orden FIFO', async () => {
    const controller = new ConcurrencyController({ maxConcurrent: 1 });
    await controller.acquire();
    const order: string[] = [];
    const first = controller.acquire().then(() => order.push('first'));
    const second = controller.acquire().then(() => order.push('second'));
    expect(controller.getWaitingCount()).toBe(2);

    controller.release();
    await first;
    controller.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(controller.getPeak()).toBe(1);
  });

  it('debe resolver false si la señal se aborta mientras espera', async () => {
    const controller = new ConcurrencyController({ maxConcurrent: 1 });
    controller.tryAcquire();
    const abort = new AbortController();
    const pending = controller.acquire(abort.signal);

    abort.abort();

    await expect(pending).resolves.toBe(false);
    expect(controller.getWaitingCount()).toBe(0);
    expect(controller.getActiveCount()).toBe(1);
  });

  it('debe despertar waiters al subir el máximo', async () => {
    const controller = new ConcurrencyController({ maxConcurrent: 1 });
    controller.tryAcquire();
    const pending = controller.acquire();

    controller.setMaxConcurrent(2);

    await expect(pending).resolves.toBe(true);
    expect(controller.getActiveCount()).toBe(2);
  });

  it('release no debe bajar de 0', () => {
    const controller = new ConcurrencyController({ maxConcurrent: 1 });
    controller.release();
    expect(controller.getActiveCount()).toBe(0);
  });
});

describe('dispatchOrder', () => {
  it('debe ordenar por prioridad descendente y luego por orden de envío', () => {
    const tasks = [
      makeTask('a', { priority: 0, submissionIndex: 0 }),
      makeTask('b', { priority: 5, submissionIndex: 1 }),
      makeTask('c', { priority: 0, submissionIndex: 2 }),
      makeTask('d', { priority: 5, submissionIndex: 3 }),
    ];
    expect(dispatchOrder(tasks).map(t => t.identifier)).toEqual(['b', 'd', 'a', 'c']);
    expect(tasks.map(t => t.identifier)).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('ConcurrencyCoordinator', () => {
  it('no debe superar maxConcurrency tareas en vuelo', async () => {
    const coordinator = new ConcurrencyCoordinator(4);
    let inFlight = 0;
    let observedPeak = 0;
    const worker: TaskWorker = async task => {
      inFlight++;
      observedPeak = Math.max(observedPeak, inFlight);
      await delay(20);
      inFlight--;
      return completedResult(task);
    };

    const results = await coordinator.run(makeTasks(5), worker, { maxConcurrency: 2 });

    expect(observedPeak).toBe(2);
    expect(coordinator.lastRun).toEqual({ peakInFlight: 2, aborted: false, haltReason: null });
    expect(results.map(r => [r.identifier, r.status])).toEqual([
      ['t0', 'completed'],
      ['t1', 'completed'],
      ['t2', 'completed'],
      ['t3', 'completed'],
      ['t4', 'completed'],
    ]);
  });

  it('debe despachar por prioridad y devolver en orden de envío', async () => {
    const coordinator = new ConcurrencyCoordinator(1);
    const started: string[] = [];
    const tasks = [
      makeTask('low', { priority: 0, submissionIndex: 0 }),
      makeTask('high', { priority: 9, submissionIndex: 1 }),
      makeTask('mid', { priority: 3, submissionIndex: 2 }),
    ];

    const results = await coordinator.run(tasks, async task => {
      started.push(task.identifier);
      return completedResult(task);
    });

    expect(started).toEqual(['high', 'mid', 'low']);
    expect(results.map(r => r.identifier)).toEqual(['low', 'high', 'mid']);
  });

  it('debe llevar cada tarea a su estado final por la máquina de estados', async () => {
    const coordinator = new ConcurrencyCoordinator(2);
    const seen: TaskStatusValue[] = [];
    const tasks = [makeTask('resumed', { status: 'paused', bytesTransferred: 50 }), makeTask('fresh')];

    await coordinator.run(tasks, async task => {
      seen.push(task.status);
      return completedResult(task);
    });

    expect(seen).toEqual(['in-flight', 'in-flight']);
    expect(tasks.map(t => t.status)).toEqual(['completed', 'completed']);
  });

  it('debe abortar el lote ante un fallo fatal y devolver las no despachadas como pausadas', async () => {
    const coordinator = new ConcurrencyCoordinator(2);
    const tasks = makeTasks(4);
    const started: string[] = [];

    const worker: TaskWorker = async (task, signal) => {
      started.push(task.identifier);
      if (task.identifier === 't0') {
        await delay(10);
        return {
          status: 'failed',
          identifier: task.identifier,
          destinationPath: task.destinationPath,
          bytesTransferred: 0,
          attempts: 1,
          mirror: 'alpha',
          category: 'Fatal',
          reason: 'ENOSPC',
          haltsBatch: true,
        };
      }
      await new Promise<void>(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
      return {
        status: 'paused',
        identifier: task.identifier,
        destinationPath: task.destinationPath,
        bytesTransferred: 5,
        attempts: 1,
        mirror: 'alpha',
        started: true,
        reason: 'cancelled',
      };
    };

    const results = await coordinator.run(tasks, worker);

    expect(started).toEqual(['t0', 't1']);
    expect(results[0]).toMatchObject({ status: 'failed', haltsBatch: true });
    expect(results[1]).toMatchObject({ status: 'paused', started: true });
    expect(results[2]).toMatchObject({
      status: 'paused',
      started: false,
      reason: 'Lote abortado por un error fatal en otra tarea',
    });
    expect(results[3]).toMatchObject({ status: 'paused', started: false });
    expect(tasks.map(t => t.status)).toEqual(['failed', 'paused', 'paused', 'paused']);
    expect(coordinator.lastRun).toMatchObject({ aborted: true, haltReason: 'ENOSPC' });
  });

  it('no debe despachar nada si la señal del llamador ya está abortada', async () => {
    const coordinator = new ConcurrencyCoordinator(2);
    const abort = new AbortController();
    abort.abort();
    const worker = jest.fn<Promise<TaskResult>, Parameters<TaskWorker>>();

    const results = await coordinator.run(makeTasks(2), worker, { signal: abort.signal });

    expect(worker).not.toHaveBeenCalled();
    expect(results.every(r => r.status === 'paused' && !r.started)).toBe(true);
    expect(results[0]).toMatchObject({ reason: 'Lote cancelado antes de iniciar la tarea' });
  });

  it('debe convertir una excepción del worker en fallo de tarea sin detener el lote', async () => {
    const coordinator = new ConcurrencyCoordinator(1);

    const results = await coordinator.run(makeTasks(2), async task => {
      if (task.identifier === 't0') throw new Error('boom');
      return completedResult(task);
    });

    expect(results[0]).toMatchObject({
      status: 'failed',
      category: 'Fatal',
      haltsBatch: false,
      reason: 'Error inesperado ejecutando la tarea: boom',
    });
    expect(results[1].status).toBe('completed');
  });

  it('debe devolver una lista vacía sin tareas', async () => {
    const coordinator = new ConcurrencyCoordinator(2);
    await expect(coordinator.run([], async task => completedResult(task))).resolves.toEqual([]);
    expect(coordinator.lastRun.peakInFlight).toBe(0);
  });
});
