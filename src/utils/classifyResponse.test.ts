import { describe, expect, it } from 'vitest';
import { ApiFaultError } from '../error/apiFaultError.js';
import { HTTPError } from '../error/httpError.js';
import { classifyResponse, isSuccessStatus, outcomeToResult } from './classifyResponse.js';

const notFound = JSON.stringify({
  Fault: { Code: 'PUGREST.NotFound', Message: 'No CID found', Details: ['No CID found that matches the given name'] },
});

describe('isSuccessStatus', () => {
  it('accepts only 2xx', () => {
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(202)).toBe(true);
    expect(isSuccessStatus(199)).toBe(false);
    expect(isSuccessStatus(300)).toBe(false);
  });
});

describe('classifyResponse', () => {
  it('recognises a fault on an error status', () => {
    expect(classifyResponse(404, notFound)).toEqual({
      kind: 'fault',
      status: 404,
      code: 'PUGREST.NotFound',
      message: 'No CID found',
      details: ['No CID found that matches the given name'],
    });
  });

  it('recognises a fault embedded in a 200 response', () => {
    const body = '{"Fault":{"Code":"PUGREST.NotFound","Message":"no compound"}}';

    expect(classifyResponse(200, body)).toEqual({
      kind: 'fault',
      status: 200,
      code: 'PUGREST.NotFound',
      message: 'no compound',
      details: [],
    });
  });

  it('treats ordinary JSON as success', () => {
    const body = '{"IdentifierList":{"CID":[2244]}}';
    expect(classifyResponse(200, body)).toEqual({ kind: 'success', status: 200, body });
  });

  it('treats non-JSON bodies by status', () => {
    expect(classifyResponse(200, 'CID\n2244\n')).toEqual({ kind: 'success', status: 200, body: 'CID\n2244\n' });
    expect(classifyResponse(503, '<html>busy</html>')).toEqual({ kind: 'status', status: 503, body: '<html>busy</html>' });
    expect(classifyResponse(500, '')).toEqual({ kind: 'status', status: 500, body: '' });
  });

  it('falls back when the fault has the wrong shape', () => {
    const body = '{"Fault":{"Code":400,"Message":"bad"}}';
    expect(classifyResponse(400, body)).toEqual({ kind: 'status', status: 400, body });
    expect(classifyResponse(200, '{"Fault":"oops"}')).toEqual({ kind: 'success', status: 200, body: '{"Fault":"oops"}' });
  });
});

describe('outcomeToResult', () => {
  it('passes success through', () => {
    expect(outcomeToResult({ kind: 'success', status: 200, body: 'ok' })).toEqual([null, { status: 200, body: 'ok' }]);
  });

  it('turns a fault into an ApiFaultError', () => {
    const [err] = outcomeToResult(classifyResponse(200, notFound));

    expect(err).toBeInstanceOf(ApiFaultError);
    expect(err instanceof ApiFaultError && err.code).toBe('PUGREST.NotFound');
    expect(err?.status).toBe(200);
  });

  it('turns a plain status into an HTTPError', () => {
    const [err] = outcomeToResult({ kind: 'status', status: 404, body: 'Not Found' });

    expect(err).toBeInstanceOf(HTTPError);
    expect(err?.status).toBe(404);
    expect(err instanceof HTTPError && err.body).toBe('Not Found');
  });
});
