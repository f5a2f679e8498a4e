/**
 * Extract API Tests
 *
 * Exercises the express app in process with an in-memory batch queue.
 */

import request from 'supertest';
import { createApp, type BatchQueue } from '../../services/extract-api/src/app';
import { STANDARD_FIELDS, WORKBOOK_MIME_TYPE, type ExtractBatchJob } from '@aqlparse/shared';
import { FULL_REPORT } from './helpers';

class FakeBatchQueue implements BatchQueue {
  readonly jobs: Array<{ name: string; data: ExtractBatchJob; jobId?: string }> = [];
  waiting = 0;

  async add(name: string, data: ExtractBatchJob, opts?: { jobId?: string }): Promise<unknown> {
    this.jobs.push({ name, data, jobId: opts?.jobId });
    return { id: opts?.jobId };
  }

  async getWaitingCount(): Promise<number> {
    return this.waiting;
  }

  async getActiveCount(): Promise<number> {
    return 0;
  }

  async getCompletedCount(): Promise<number> {
    return 0;
  }

  async getFailedCount(): Promise<number> {
    return 0;
  }

  async getDelayedCount(): Promise<number> {
    return 0;
  }
}

describe('Extract API', () => {
  let queue: FakeBatchQueue;

  beforeEach(() => {
    queue = new FakeBatchQueue();
  });

  describe('GET /health', () => {
    it('should report the registered profiles and queue depth', async () => {
      queue.waiting = 4;
      const response = await request(createApp({ batchQueue: queue })).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.profiles).toEqual(['aql_standard', 'aql_extended']);
      expect(response.body.queue_depth).toBe(4);
    });
  });

  describe('GET /profiles', () => {
    it('should list profile columns', async () => {
      const response = await request(createApp()).get('/profiles');

      expect(response.status).toBe(200);
      expect(response.body.default_profile).toBe('aql_standard');
      expect(response.body.profiles[0]).toEqual({
        id: 'aql_standard',
        description: 'AQL inspection report, 13 columns',
        columns: [...STANDARD_FIELDS],
      });
    });
  });

  describe('GET /metrics', () => {
    it('should expose extraction counters', async () => {
      const app = createApp({ batchQueue: queue });
      await request(app)
        .post('/extract')
        .send({ documents: [{ identifier: 'a.pdf', text: FULL_REPORT }] });

      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.text).toContain('aqlparse_documents_processed_total');
      expect(response.text).toContain('aqlparse_queue_depth{queue="extract_batch"} 0');
    });
  });

  describe('POST /extract', () => {
    it('should return records and failures in input order', async () => {
      const response = await request(createApp())
        .post('/extract')
        .set('X-Correlation-Id', 'corr-test-1')
        .send({
          documents: [
            { identifier: 'a.pdf', text: FULL_REPORT },
            { identifier: 'b.pdf', text: '' },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.headers['x-correlation-id']).toBe('corr-test-1');
      expect(response.body.correlation_id).toBe('corr-test-1');
      expect(response.body.profile).toBe('aql_standard');
      expect(response.body.records).toHaveLength(1);
      expect(response.body.records[0].identifier).toBe('a.pdf');
      expect(response.body.records[0].fields['Customer']).toBe('ACME CO');
      expect(Object.keys(response.body.records[0].fields)).toEqual([...STANDARD_FIELDS]);
      expect(response.body.failures).toEqual([{ identifier: 'b.pdf', reason: 'no text content' }]);
      expect(response.body.outcomes).toEqual([
        { identifier: 'a.pdf', status: 'success' },
        { identifier: 'b.pdf', status: 'failure' },
      ]);
    });

    it('should reject an invalid body', async () => {
      const response = await request(createApp())
        .post('/extract')
        .set('X-Correlation-Id', 'corr-test-2')
        .send({ documents: [] });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: {
          code: 'invalid_request',
          message: '/documents: must NOT have fewer than 1 items',
          correlation_id: 'corr-test-2',
        },
      });
    });

    it('should reject an unknown profile', async () => {
      const response = await request(createApp())
        .post('/extract')
        .send({ profile: 'nope', documents: [{ identifier: 'a.pdf', text: 'x' }] });

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe('profile_not_found');
    });

    it('should reject oversized batches', async () => {
      const response = await request(createApp({ maxBatchDocuments: 1 }))
        .post('/extract')
        .send({
          documents: [
            { identifier: 'a.pdf', text: 'x' },
            { identifier: 'b.pdf', text: 'y' },
          ],
        });

      expect(response.status).toBe(413);
      expect(response.body.error.code).toBe('batch_too_large');
    });
  });

  describe('POST /extract/xlsx', () => {
    it('should return the merged workbook', async () => {
      const response = await request(createApp())
        .post('/extract/xlsx')
        .send({
          documents: [
            { identifier: 'a.pdf', text: FULL_REPORT },
            { identifier: 'b.pdf', text: '' },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe(WORKBOOK_MIME_TYPE);
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="AQL_Parsed_All.xlsx"'
      );
      expect(response.headers['x-failed-documents']).toBe('1');
    });
  });

  describe('POST /batches', () => {
    const body = {
      profile: 'aql_extended',
      files: [{ identifier: 'a.pdf', path: '/data/a.pdf' }],
    };

    it('should enqueue an extract_batch job', async () => {
      const response = await request(createApp({ batchQueue: queue }))
        .post('/batches')
        .set('X-Correlation-Id', 'corr-test-3')
        .send(body);

      expect(response.status).toBe(202);
      expect(queue.jobs).toHaveLength(1);

      const [job] = queue.jobs;
      expect(job.name).toBe('extract_batch');
      expect(job.jobId).toBe(`batch_${response.body.batch_id}`);
      expect(job.data).toMatchObject({
        event_type: 'batch.submitted',
        batch_id: response.body.batch_id,
        correlation_id: 'corr-test-3',
        profile: 'aql_extended',
        files: body.files,
      });
    });

    it('should reject under backpressure', async () => {
      queue.waiting = 5000;
      const response = await request(createApp({ batchQueue: queue })).post('/batches').send(body);

      expect(response.status).toBe(503);
      expect(response.body.error.code).toBe('service_unavailable');
      expect(queue.jobs).toHaveLength(0);
    });

    it('should answer 503 without a queue', async () => {
      const response = await request(createApp()).post('/batches').send(body);

      expect(response.status).toBe(503);
      expect(response.body.error.code).toBe('queue_unavailable');
    });

    it('should reject a body without files', async () => {
      const response = await request(createApp({ batchQueue: queue }))
        .post('/batches')
        .send({ files: [] });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('invalid_request');
    });
  });
});
