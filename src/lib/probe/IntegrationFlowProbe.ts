/**
 * Integration Flow Probe
 *
 * Black-box check of the F1 (energy optimisation) flow against running
 * services:
 *
 *   submitted -> (wait) -> negotiated/transferred -> job dispatched
 *
 * 1. Submit a tool request to the Dashboard API
 * 2. Sleep for the configured time (no polling)
 * 3. Read the request status and pick up the DSS job id, if any
 * 4. Query the DSS job with the static API key
 *
 * Job completion (the DSS webhook, minutes later) happens after the probe
 * exits and is not observed.
 *
 * @license Apache-2.0
 */

import { setTimeout as delay } from 'timers/promises';
import { DashboardApiClient } from './DashboardApiClient';
import { DssApiClient } from './DssApiClient';
import { defaultFetch, parseJsonBody, type FetchLike } from './http';
import { dashboardBaseUrl, dssBaseUrl, type ProbeConfig } from './probe-config';
import { isJobStatus, isRequestRecord, isToolResponse } from './schemas';
import type { RequestStatus, ToolRequest } from './types';
import { ProbeError } from '../errors';
import { consoleReporter, type Reporter } from '../reporter';

export type ProbeOutcome = 'passed' | 'warning' | 'failed';

export interface ProbeReport {
  outcome: ProbeOutcome;
  requestId: string;
  initialStatus: string | null;
  finalStatus: string | null;
  dssJobId: string | null;
  jobStatus: string | null;
  /** Warnings, or the reason for a failed outcome */
  notes: string[];
}

export interface ProbeDependencies {
  dashboard: DashboardApiClient;
  dss: DssApiClient;
  sleep?: (ms: number) => Promise<void>;
  reporter?: Reporter;
}

const FAILED_STATUS: RequestStatus = 'failed';

export class IntegrationFlowProbe {
  private dashboard: DashboardApiClient;
  private dss: DssApiClient;
  private sleep: (ms: number) => Promise<void>;
  private reporter: Reporter;

  constructor(
    private config: ProbeConfig,
    deps: ProbeDependencies
  ) {
    this.dashboard = deps.dashboard;
    this.dss = deps.dss;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.reporter = deps.reporter ?? consoleReporter;
  }

  /**
   * @throws ProbeError when the Dashboard API gives no usable answer; the
   *   remaining steps are skipped
   */
  async run(): Promise<ProbeReport> {
    const { reporter } = this;

    // 1. Submit
    reporter.info('Step 1: Initiating request to Dashboard API');
    const request: ToolRequest = {
      building_id: this.config.buildingId,
      optimization_type: this.config.optimizationType,
      user_id: this.config.userId,
    };
    const submitted = await this.dashboard.requestTool(request).catch((error: unknown) => {
      throw asEmptyResponse(error, 'Failed to get response from Dashboard API');
    });
    if (submitted.body.trim() === '') {
      throw new ProbeError('EMPTY_RESPONSE', 'Failed to get response from Dashboard API');
    }

    const submittedPayload = parseJsonBody(submitted.body);
    if (!isToolResponse(submittedPayload)) {
      throw new ProbeError('MISSING_REQUEST_ID', 'No request ID received', submitted.body);
    }
    const requestId = submittedPayload.request_id;
    const initialStatus = submittedPayload.status ?? null;
    reporter.info(`Request ID: ${requestId}`);
    reporter.info(`Initial Status: ${initialStatus ?? 'null'}`);

    // 2. Wait
    reporter.info('Step 2: Contract negotiation and transfer in progress');
    reporter.info(`Waiting ${this.config.waitSeconds} seconds for the connectors to deliver access credentials...`);
    await this.sleep(this.config.waitSeconds * 1000);

    // 3. Status
    const statusResult = await this.dashboard.getRequest(requestId).catch((error: unknown) => {
      throw asEmptyResponse(error, 'Failed to get status response');
    });
    if (statusResult.body.trim() === '') {
      throw new ProbeError('EMPTY_RESPONSE', 'Failed to get status response');
    }
    const statusPayload = parseJsonBody(statusResult.body);
    if (!isRequestRecord(statusPayload)) {
      throw new ProbeError('MALFORMED_RESPONSE', 'Unreadable status response', statusResult.body);
    }
    const finalStatus = statusPayload.status ?? null;
    reporter.info(`Final Status: ${finalStatus ?? 'null'}`);
    if (finalStatus === FAILED_STATUS && statusPayload.error) {
      reporter.warn(`Dashboard reported: ${statusPayload.error}`);
    }

    // 4. Job
    reporter.info('Step 3: Verifying transfer completion and data access');
    const dssJobId = statusPayload.dss_job_id || null;
    const report: ProbeReport = {
      outcome: 'passed',
      requestId,
      initialStatus,
      finalStatus,
      dssJobId,
      jobStatus: null,
      notes: [],
    };

    if (!dssJobId) {
      return this.incomplete(report, 'No DSS job ID found in response');
    }

    reporter.info(`DSS Job ID: ${dssJobId}`);
    const jobResult = await this.dss.getJob(dssJobId).catch((error: unknown) => {
      throw asEmptyResponse(error, 'Failed to get DSS job status');
    });
    if (jobResult.body.trim() === '') {
      return this.incomplete(report, 'Could not retrieve DSS job status');
    }

    const jobPayload = parseJsonBody(jobResult.body);
    report.jobStatus = isJobStatus(jobPayload) ? jobPayload.status : null;
    reporter.info(`DSS Job Status: ${report.jobStatus ?? 'null'}`);
    reporter.info('Test completed successfully');
    return report;
  }

  private incomplete(report: ProbeReport, reason: string): ProbeReport {
    report.notes.push(reason);
    if (this.config.profile.failOnIncompleteHandoff) {
      report.outcome = 'failed';
      this.reporter.error(`Test failed: ${reason}`);
    } else {
      report.outcome = 'warning';
      this.reporter.warn(reason);
      this.reporter.info('Test completed with warnings');
    }
    return report;
  }
}

/**
 * A request that never got an answer is reported like an empty body.
 */
function asEmptyResponse(error: unknown, message: string): unknown {
  if (error instanceof ProbeError && error.code === 'TRANSPORT') {
    return new ProbeError('TRANSPORT', `${message}: ${error.message}`);
  }
  return error;
}

export function createIntegrationFlowProbe(
  config: ProbeConfig,
  options: { fetchImpl?: FetchLike; sleep?: (ms: number) => Promise<void>; reporter?: Reporter } = {}
): IntegrationFlowProbe {
  const fetchImpl = options.fetchImpl ?? defaultFetch;
  return new IntegrationFlowProbe(config, {
    dashboard: new DashboardApiClient(dashboardBaseUrl(config), fetchImpl),
    dss: new DssApiClient(dssBaseUrl(config), config.dssApiKey, fetchImpl),
    sleep: options.sleep,
    reporter: options.reporter,
  });
}
