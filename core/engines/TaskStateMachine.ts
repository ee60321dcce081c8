/**
 * Máquina de estados explícita para tareas de transferencia.
 *
 * pending → in-flight → {completed, paused, failed}; paused → pending al reanudar.
 * Solo pending y paused sobreviven a un reinicio (archivo .part en disco).
 *
 * @module TaskStateMachine
 */

import { TaskStatus } from './types';
import type { TaskStatusValue, TransferTask } from './types';

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 * Cualquier transición no listada es inválida.
 */
const TRANSITIONS: Record<TaskStatusValue, readonly TaskStatusValue[]> = {
  [TaskStatus.PENDING]: [TaskStatus.IN_FLIGHT, TaskStatus.PAUSED],
  [TaskStatus.IN_FLIGHT]: [TaskStatus.COMPLETED, TaskStatus.PAUSED, TaskStatus.FAILED],
  [TaskStatus.PAUSED]: [TaskStatus.PENDING],
  [TaskStatus.COMPLETED]: [],
  [TaskStatus.FAILED]: [],
};

export function canTransition(from: TaskStatusValue, to: TaskStatusValue): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: TaskStatusValue): boolean {
  return status === TaskStatus.COMPLETED || status === TaskStatus.FAILED;
}

export class InvalidTransitionError extends Error {
  constructor(identifier: string, from: TaskStatusValue, to: TaskStatusValue) {
    super(`Transición inválida para ${identifier}: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/** Aplica la transición sobre la tarea o lanza InvalidTransitionError. */
export function transitionTask(task: TransferTask, to: TaskStatusValue): void {
  if (!canTransition(task.status, to)) {
    throw new InvalidTransitionError(task.identifier, task.status, to);
  }
  task.status = to;
}
