import type { FabricEndpointStatus, FabricTaskState, IFabricClient } from '../../app/infrastructure/fabric';

export interface FabricSubmission {
  readonly endpointId: string;
  readonly functionId: string;
  readonly payloads: readonly unknown[];
}

/** Task ids are handed out as `task-1`, `task-2`, ... in submission order. */
export class FakeFabricClient implements IFabricClient {
  readonly endpointStatus = new Map<string, string>();
  readonly submissions: FabricSubmission[] = [];
  readonly results = new Map<string, FabricTaskState>();
  private nextTask = 0;

  async getEndpointStatus(endpointId: string): Promise<FabricEndpointStatus> {
    return { status: this.endpointStatus.get(endpointId) ?? 'online' };
  }

  async submitTasks(endpointId: string, functionId: string, payloads: readonly unknown[]): Promise<string[]> {
    this.submissions.push({ endpointId, functionId, payloads });
    return payloads.map(() => {
      this.nextTask += 1;
      return `task-${this.nextTask}`;
    });
  }

  async getTask(taskId: string): Promise<FabricTaskState> {
    return this.results.get(taskId) ?? { taskId, status: 'pending' };
  }

  async getTasks(taskIds: readonly string[]): Promise<FabricTaskState[]> {
    return Promise.all(taskIds.map(taskId => this.getTask(taskId)));
  }

  async waitForResult(taskId: string): Promise<FabricTaskState> {
    return this.getTask(taskId);
  }
}
