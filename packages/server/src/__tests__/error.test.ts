import { describe, expect, it } from 'vitest';
import { ImageError } from '@pixhold/services';

import { ApiError, toHttpError } from '../error.js';
import { parseDeclaredSize, parsePageParam, toImageJson } from '../routes/images.js';

describe('toHttpError', () => {
  it('keeps the status of API errors', () => {
    expect(toHttpError(ApiError.badRequest('bad'))).toEqual({ statusCode: 400, message: 'bad' });
    expect(toHttpError(ApiError.notFound())).toEqual({ statusCode: 404, message: 'Not Found' });
  });

  it('maps image errors by code', () => {
    expect(toHttpError(ImageError.validationFailed('TooLarge', 'too big')).statusCode).toBe(413);
    expect(toHttpError(ImageError.validationFailed('UnsupportedType', 'nope'))).toEqual({
      statusCode: 400,
      message: 'nope'
    });
    expect(toHttpError(ImageError.validationFailed('TypeMismatch', 'nope')).statusCode).toBe(400);
    expect(toHttpError(ImageError.invalidPage('x')).statusCode).toBe(400);
    expect(toHttpError(ImageError.notFound(7))).toEqual({ statusCode: 404, message: 'Image 7 not found' });
    expect(toHttpError(ImageError.storageWriteFailed('a.png', new Error('EACCES'))).statusCode).toBe(500);
    expect(toHttpError(ImageError.metadataWriteFailed('a.png', new Error('locked'))).statusCode).toBe(500);
    expect(toHttpError(ImageError.metadataDeleteFailed(7, new Error('locked'))).statusCode).toBe(500);
  });

  it('passes through client errors raised by plugins', () => {
    const error = Object.assign(new Error('Unsupported Media Type'), { statusCode: 415 });
    expect(toHttpError(error)).toEqual({ statusCode: 415, message: 'Unsupported Media Type' });
  });

  it('hides everything else behind a 500', () => {
    expect(toHttpError(new Error('SQLITE_CORRUPT'))).toEqual({
      statusCode: 500,
      message: 'Internal server error'
    });
    const upstream = Object.assign(new Error('boom'), { statusCode: 502 });
    expect(toHttpError(upstream).message).toBe('Internal server error');
    expect(toHttpError('not even an error').statusCode).toBe(500);
  });
});

describe('parsePageParam', () => {
  it('defaults missing and blank values to the first page', () => {
    expect(parsePageParam(undefined)).toBe(1);
    expect(parsePageParam('  ')).toBe(1);
  });

  it('accepts signed integers', () => {
    expect(parsePageParam('3')).toBe(3);
    expect(parsePageParam(' 0 ')).toBe(0);
    expect(parsePageParam('-2')).toBe(-2);
    expect(parsePageParam('99999999999999999999')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('rejects anything else', () => {
    for (const raw of ['abc', '1.5', '2e3', '0x10']) {
      expect(() => parsePageParam(raw)).toThrow(`Invalid page number: ${JSON.stringify(raw)}`);
    }
  });

  it('rejects repeated values', () => {
    expect(() => parsePageParam(['1', '2'])).toThrow('Invalid page number: "1,2"');
  });
});

describe('parseDeclaredSize', () => {
  it('reads a numeric content length', () => {
    expect(parseDeclaredSize('2048')).toBe(2048);
    expect(parseDeclaredSize(' 17 ')).toBe(17);
  });

  it('ignores missing or malformed headers', () => {
    expect(parseDeclaredSize(undefined)).toBeUndefined();
    expect(parseDeclaredSize('')).toBeUndefined();
    expect(parseDeclaredSize('-5')).toBeUndefined();
    expect(parseDeclaredSize('12kb')).toBeUndefined();
    expect(parseDeclaredSize('99999999999999999999')).toBeUndefined();
  });
});

describe('toImageJson', () => {
  it('reports size in kilobytes rounded to two places', () => {
    expect(
      toImageJson({
        id: 4,
        filename: 'f.gif',
        originalName: 'party.gif',
        size: 1000,
        uploadTime: '2024-05-01T12:00:00.000Z',
        fileType: 'gif',
        url: '/images/f.gif'
      })
    ).toEqual({
      id: 4,
      filename: 'f.gif',
      original_name: 'party.gif',
      size_kb: 0.98,
      upload_time: '2024-05-01T12:00:00.000Z',
      file_type: 'gif',
      url: '/images/f.gif'
    });
  });
});
