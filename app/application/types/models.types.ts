import type { ClusterJobs } from '../../domain/entities';

export interface ModelListResponse {
  object: 'list';
  data: ModelInfo[];
}

export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
  federated: boolean;
  cluster?: string;
  framework?: string;
  description?: string;
}

export interface ClusterJobsResponse {
  cluster: string;
  fetched_at: string | null;
  fresh: boolean;
  jobs: ClusterJobs;
}
