import { describe, it, expect } from 'vitest';
import { success, errors, csvFile, type ApiResponse } from './api-response';

describe('API Response Helpers', () => {
  describe('success', () => {
    it('should return 200 by default', () => {
      expect(success({ email: 'jsmith@acme.com' }).status).toBe(200);
    });

    it('should wrap data in success response', async () => {
      const body = await success({ email: 'jsmith@acme.com' }).json();
      expect(body).toEqual({ success: true, data: { email: 'jsmith@acme.com' } });
    });

    it('should set content-type header', () => {
      expect(success({}).headers.get('content-type')).toContain('application/json');
    });
  });

  describe('errors', () => {
    it('should return 400 with the message for badRequest', async () => {
      const response = errors.badRequest('Missing field');
      const body = await response.json();

      expect(response.status).toBe(400);
      expect(body.success).toBe(false);
      expect(body.error).toBe('Missing field');
    });

    it('should return 413 for payloadTooLarge', () => {
      expect(errors.payloadTooLarge().status).toBe(413);
    });

    it('should return 503 for serviceUnavailable', async () => {
      const response = errors.serviceUnavailable();
      const body = await response.json();

      expect(response.status).toBe(503);
      expect(body.error).toBe('Service unavailable');
    });

    it('should include an errorId and hide details from internal errors', async () => {
      const response = errors.internal('Email finder failed', new Error('secret stack detail'));
      const body = await response.json();

      expect(response.status).toBe(500);
      expect(typeof body.errorId).toBe('string');
      expect(body.errorId).toHaveLength(8);
      expect(body.details).toBeUndefined();
    });
  });

  describe('csvFile', () => {
    it('should return the CSV as an attachment', async () => {
      const response = csvFile('a,b\n1,2\n', 'results.csv');

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/csv; charset=utf-8');
      expect(response.headers.get('content-disposition')).toBe('attachment; filename="results.csv"');
      expect(await response.text()).toBe('a,b\n1,2\n');
    });
  });
});

describe('ApiResponse type', () => {
  it('should narrow on the success flag', () => {
    const response: ApiResponse<{ email: string }> = {
      success: false,
      error: 'Something went wrong',
    };
    expect(response.success ? response.data.email : response.error).toBe('Something went wrong');
  });
});
