import type { BatchErrorKind, BatchStatus } from '../../domain/entities';

export interface SubmitBatchBody {
  model: string;
  input_file: string;
  output_folder_path: string;
  cluster?: string;
  framework?: string;
}

export interface BatchLineErrorView {
  line: number;
  task_id: string;
  error: string;
}

export interface BatchView {
  id: string;
  object: 'batch';
  status: BatchStatus;
  model: string;
  cluster: string;
  framework: string;
  input_file: string;
  output_folder_path: string;
  created_at: string;
  in_progress_at: string | null;
  completed_at: string | null;
  failed_at: string | null;
  cancelling_at: string | null;
  cancelled_at: string | null;
  result_location: string | null;
  error: string | null;
  error_kind: BatchErrorKind | null;
  request_counts: {
    total: number;
    completed: number;
    failed: number;
  };
  errors: BatchLineErrorView[];
}

export interface BatchListResponse {
  object: 'list';
  data: BatchView[];
}
