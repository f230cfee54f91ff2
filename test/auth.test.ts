import { Request, Response, NextFunction } from 'express';
import { createApiKeyGuard } from '../src/middleware/auth';

describe('API Key Authentication Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let nextFunction: NextFunction;
  let originalApiKey: string | undefined;

  beforeEach(() => {
    mockRequest = {
      headers: {}
    };
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis()
    };
    nextFunction = jest.fn();
    originalApiKey = process.env.API_KEY;
    jest.spyOn(console, 'error').mockImplementation(() => { });
  });

  afterEach(() => {
    if (originalApiKey === undefined) {
      delete process.env.API_KEY;
    } else {
      process.env.API_KEY = originalApiKey;
    }
    jest.restoreAllMocks();
  });

  it('should return 500 if no key is configured', () => {
    const guard = createApiKeyGuard(() => undefined);

    guard(mockRequest as Request, mockResponse as Response, nextFunction);

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(mockResponse.json).toHaveBeenCalledWith({ error: 'Server configuration error' });
    expect(console.error).toHaveBeenCalledWith('[Auth] API_KEY is not configured, rejecting request');
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 401 if X-API-Key header is missing', () => {
    const guard = createApiKeyGuard(() => 'test-secret');

    guard(mockRequest as Request, mockResponse as Response, nextFunction);

    expect(mockResponse.status).toHaveBeenCalledWith(401);
    expect(mockResponse.json).toHaveBeenCalledWith({ error: 'Missing X-API-Key header' });
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 403 if API key is invalid', () => {
    const guard = createApiKeyGuard(() => 'test-secret');
    mockRequest.headers = { 'x-api-key': 'wrong-secret' };

    guard(mockRequest as Request, mockResponse as Response, nextFunction);

    expect(mockResponse.status).toHaveBeenCalledWith(403);
    expect(mockResponse.json).toHaveBeenCalledWith({ error: 'Invalid API key' });
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 403 for a key of a different length', () => {
    const guard = createApiKeyGuard(() => 'test-secret');
    mockRequest.headers = { 'x-api-key': 'test' };

    guard(mockRequest as Request, mockResponse as Response, nextFunction);

    expect(mockResponse.status).toHaveBeenCalledWith(403);
  });

  it('should call next() if API key is valid', () => {
    const guard = createApiKeyGuard(() => 'test-secret');
    mockRequest.headers = { 'x-api-key': 'test-secret' };

    guard(mockRequest as Request, mockResponse as Response, nextFunction);

    expect(nextFunction).toHaveBeenCalled();
    expect(mockResponse.status).not.toHaveBeenCalled();
  });

  it('should read the key from the environment by default', () => {
    process.env.API_KEY = 'env-secret';
    const guard = createApiKeyGuard();
    mockRequest.headers = { 'x-api-key': 'env-secret' };

    guard(mockRequest as Request, mockResponse as Response, nextFunction);

    expect(nextFunction).toHaveBeenCalled();
  });
});
