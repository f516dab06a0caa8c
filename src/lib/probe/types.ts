/**
 * Payloads of the Dashboard and DSS APIs
 *
 * Field names follow the services' JSON (snake_case).
 *
 * @license Apache-2.0
 */

export interface ToolRequest {
  building_id: string;
  optimization_type: string;
  user_id: string;
  callback_url?: string;
}

export interface ToolResponse {
  request_id: string;
  status?: string | null;
  message?: string | null;
  dss_job_id?: string | null;
}

/**
 * Lifecycle of a Dashboard tool request. The probe only observes the
 * states up to `dss_job_running`; `completed` is set later by the DSS
 * webhook callback.
 */
export type RequestStatus =
  | 'initiated'
  | 'processing_via_edcpy'
  | 'dss_job_running'
  | 'completed'
  | 'failed';

export interface RequestRecord {
  request_id?: string | null;
  user_id?: string | null;
  building_id?: string | null;
  optimization_type?: string | null;
  /** Usually a RequestStatus; kept open so unknown states can be reported */
  status?: string | null;
  dss_job_id?: string | null;
  error?: string | null;
  created_at?: string | null;
  completed_at?: string | null;
}

export interface JobStatus {
  job_id: string;
  /** pending, running, completed, failed or cancelled */
  status: string;
  progress?: number;
  result?: Record<string, unknown> | null;
  created_at?: string | null;
  completed_at?: string | null;
}

export interface RequestList {
  requests: RequestRecord[];
}

export interface JobList {
  jobs: JobStatus[];
}
