import { ConfigService } from '@nestjs/config';
import { WebhookService } from './webhook.service';
import type { ExtractionJob } from '../interfaces/job.interface';
import { installMockAgent, MockAgentHandle } from '@/testing/mock-agent';

const FAILED_JOB: ExtractionJob = {
  id: 'job-1',
  status: 'failed',
  stage: 'fetch',
  createdAt: '2026-01-01T00:00:00.000Z',
  completedAt: '2026-01-01T00:00:01.000Z',
  input: {
    url: 'https://site.test/',
    instruction: 'Anything',
    format: 'json',
    timeoutSeconds: 30,
    structuredExtraction: false,
    strictSchema: false,
    antiDetection: false,
    checkCompliance: true,
  },
  error: { stage: 'fetch', code: 'FETCH_FAILED', message: 'HTTP Error: 503' },
};

describe('WebhookService', () => {
  let mock: MockAgentHandle;
  let webhook: WebhookService;

  beforeEach(() => {
    mock = installMockAgent();
    webhook = new WebhookService(new ConfigService({ USER_AGENT: 'test-agent' }));
  });

  afterEach(async () => {
    await mock.restore();
  });

  it('posts the job response and its input as JSON', async () => {
    let received: unknown;
    mock.agent
      .get('https://hooks.test')
      .intercept({
        path: '/jobs',
        method: 'POST',
        headers: { 'content-type': 'application/json', 'user-agent': 'test-agent' },
      })
      .reply(204, (options) => {
        received = JSON.parse(String(options.body));
        return '';
      });

    await expect(webhook.deliver('https://hooks.test/jobs', FAILED_JOB)).resolves.toBe(
      true,
    );
    expect(received).toEqual({
      jobId: 'job-1',
      status: 'failed',
      stage: 'fetch',
      url: 'https://site.test/',
      instruction: 'Anything',
      format: 'json',
      createdAt: '2026-01-01T00:00:00.000Z',
      startedAt: null,
      completedAt: '2026-01-01T00:00:01.000Z',
      compliance: null,
      result: null,
      error: { stage: 'fetch', code: 'FETCH_FAILED', message: 'HTTP Error: 503' },
      downloads: {},
      input: {
        url: 'https://site.test/',
        instruction: 'Anything',
        format: 'json',
        timeoutSeconds: 30,
        structuredExtraction: false,
        strictSchema: false,
        antiDetection: false,
        checkCompliance: true,
      },
    });
  });

  it('reports an error status as undelivered', async () => {
    mock.agent
      .get('https://hooks.test')
      .intercept({ path: '/jobs', method: 'POST' })
      .reply(500, 'boom');

    await expect(webhook.deliver('https://hooks.test/jobs', FAILED_JOB)).resolves.toBe(
      false,
    );
  });

  it('reports a connection failure as undelivered', async () => {
    mock.agent
      .get('https://hooks.test')
      .intercept({ path: '/jobs', method: 'POST' })
      .replyWithError(new Error('connection refused'));

    await expect(webhook.deliver('https://hooks.test/jobs', FAILED_JOB)).resolves.toBe(
      false,
    );
  });
});
