/**
 * Response validators (Ajv)
 *
 * Additional properties are allowed; only the fields below are read.
 * Optional fields accept null as well as omission.
 *
 * @license Apache-2.0
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';
import type { JobList, JobStatus, RequestList, RequestRecord, ToolResponse } from './types';

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
  allowUnionTypes: true,
});

const nullableString = { type: ['string', 'null'] };

const requestRecordSchema = {
  type: 'object',
  properties: {
    request_id: nullableString,
    user_id: nullableString,
    building_id: nullableString,
    optimization_type: nullableString,
    status: nullableString,
    dss_job_id: nullableString,
    error: nullableString,
    created_at: nullableString,
    completed_at: nullableString,
  },
};

const jobStatusSchema = {
  type: 'object',
  required: ['job_id', 'status'],
  properties: {
    job_id: { type: 'string' },
    status: { type: 'string' },
    progress: { type: 'number' },
    result: { type: ['object', 'null'] },
    created_at: nullableString,
    completed_at: nullableString,
  },
};

export const isToolResponse = ajv.compile<ToolResponse>({
  type: 'object',
  required: ['request_id'],
  properties: {
    request_id: { type: 'string', minLength: 1 },
    status: nullableString,
    message: nullableString,
    dss_job_id: nullableString,
  },
});

export const isRequestRecord = ajv.compile<RequestRecord>(requestRecordSchema);

export const isJobStatus = ajv.compile<JobStatus>(jobStatusSchema);

export const isRequestList = ajv.compile<RequestList>({
  type: 'object',
  required: ['requests'],
  properties: {
    requests: { type: 'array', items: requestRecordSchema },
  },
});

export const isJobList = ajv.compile<JobList>({
  type: 'object',
  required: ['jobs'],
  properties: {
    jobs: { type: 'array', items: jobStatusSchema },
  },
});

/**
 * Validation errors of the last call to `validate`, one line per error.
 */
export function describeErrors(validate: { errors?: ErrorObject[] | null }): string {
  const errors = validate.errors ?? [];
  return errors
    .map((error) => `${error.instancePath || '(root)'} ${error.message ?? 'is invalid'}`)
    .join('; ');
}
