/**
 * Upload result types
 */

/**
 * Acknowledgment returned by the report service for one accepted run.
 */
export interface UploadResult {
  /** Project the run was filed under */
  project: string;
  /** Run identifier assigned by the service, 0 when not reported */
  runId: number;
  /** Link to the rendered report (relative to the service or absolute) */
  uiUrl: string;
  /** Link to the "latest run" view of the project */
  latestUrl: string;
  /** Service-defined status such as "ok", "processing" or "failed" */
  status: string;
  /** Present only when the service reported a problem */
  error?: string;
}

/** Status reported when the service does not send one */
export const UNKNOWN_STATUS = 'unknown';
