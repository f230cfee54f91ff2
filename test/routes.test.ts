import { Request, Response } from 'express';
import { createApplication, type Application } from '../src/app';
import { createEventLoop, type EventLoop } from '../src/engine';
import { createHealthCheckRouter } from '../src/routes/healthCheck';
import { createCircuitRouter } from '../src/routes/circuit';
import { createFactsRouter } from '../src/routes/facts';
import { NUMBER_SCHEMA } from '../src/value';
import { EmitterStatus } from '../src/circuit';

// Helper to simulate Express route handling
function createMockRes(): { res: Partial<Response>; statusFn: jest.Mock; jsonFn: jest.Mock; sendFn: jest.Mock } {
  const jsonFn = jest.fn();
  const sendFn = jest.fn();
  const statusFn = jest.fn().mockReturnValue({ json: jsonFn, send: sendFn });
  return {
    res: { status: statusFn, json: jsonFn } as Partial<Response>,
    statusFn,
    jsonFn,
    sendFn,
  };
}

function getRouteHandler(router: any, method: string, path: string): (req: Request, res: Response) => void {
  // Express Router stores routes in router.stack
  const layer = router.stack.find((l: any) => l.route && l.route.path === path && l.route.methods[method]);
  return layer.route.stack[0].handle;
}

function mockReq(params: Record<string, string> = {}, body: unknown = {}): Request {
  return { params, body } as unknown as Request;
}

let application: Application;
let loop: EventLoop;

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => { });
  jest.spyOn(console, 'warn').mockImplementation(() => { });
  application = createApplication();
  loop = createEventLoop(application.circuit, { awaitTimeoutMs: 1000, maxEventsPerDrain: 100 });
});

afterEach(() => {
  application.shutdown();
  jest.restoreAllMocks();
});

describe('GET /api/health-check', () => {
  it('should report ok while the circuit is open', () => {
    const handler = getRouteHandler(createHealthCheckRouter(application), 'get', '/');
    const { res, statusFn, jsonFn } = createMockRes();

    handler(mockReq(), res as Response);

    expect(statusFn).toHaveBeenCalledWith(200);
    expect(jsonFn.mock.calls[0][0].status).toBe('ok');
  });

  it('should return 503 once the circuit is closed', () => {
    const handler = getRouteHandler(createHealthCheckRouter(application), 'get', '/');
    const { res, statusFn, jsonFn } = createMockRes();
    application.shutdown();

    handler(mockReq(), res as Response);

    expect(statusFn).toHaveBeenCalledWith(503);
    expect(jsonFn.mock.calls[0][0].status).toBe('closed');
  });
});

describe('GET /api/circuit', () => {
  it('should report table, loop and error statistics', () => {
    application.createFact('temperature', NUMBER_SCHEMA);
    const handler = getRouteHandler(createCircuitRouter(application, loop), 'get', '/');
    const { res, statusFn, jsonFn } = createMockRes();

    handler(mockReq(), res as Response);

    expect(statusFn).toHaveBeenCalledWith(200);
    const body = jsonFn.mock.calls[0][0];
    expect(body.circuit.emitters).toEqual({ size: 1, live: 1, free: 0, retired: 0 });
    expect(body.loop.running).toBe(false);
    expect(body.errors).toEqual({ count: 0, last: null });
    expect(body.facts).toBe(1);
  });
});

describe('/api/facts', () => {
  let router: ReturnType<typeof createFactsRouter>;

  beforeEach(() => {
    router = createFactsRouter(application);
  });

  describe('POST /', () => {
    it('should create a named Fact', () => {
      const handler = getRouteHandler(router, 'post', '/');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq({}, { name: 'temperature', schema: { kind: 'number' } }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(201);
      expect(jsonFn).toHaveBeenCalledWith({
        name: 'temperature',
        schema: { kind: 'number' },
        handle: 'emitters#0@1',
        valid: true,
        status: 'IDLE',
        value: null,
      });
      expect(application.getFact('temperature')).not.toBeNull();
    });

    it('should return 409 for a duplicate name', () => {
      application.createFact('temperature', NUMBER_SCHEMA);
      const handler = getRouteHandler(router, 'post', '/');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq({}, { name: 'temperature', schema: { kind: 'number' } }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(409);
      expect(jsonFn).toHaveBeenCalledWith({ error: 'A Fact named "temperature" already exists' });
    });

    it('should return 400 for an invalid body', () => {
      const handler = getRouteHandler(router, 'post', '/');
      const { res, statusFn } = createMockRes();

      handler(mockReq({}, { name: 'bad name!', schema: { kind: 'number' } }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(400);
    });
  });

  describe('GET /', () => {
    it('should list Facts with their current value', () => {
      const fact = application.createFact('temperature', NUMBER_SCHEMA, { print: true });
      fact.emitCompletion();
      loop.drain();
      const handler = getRouteHandler(router, 'get', '/');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq(), res as Response);

      expect(statusFn).toHaveBeenCalledWith(200);
      const [entry] = jsonFn.mock.calls[0][0].facts;
      expect(entry.name).toBe('temperature');
      expect(entry.status).toBe('COMPLETED');
      expect(entry.value).toBeNull();
    });
  });

  describe('POST /:name/value', () => {
    it('should queue a value that matches the schema', () => {
      const fact = application.createFact('temperature', NUMBER_SCHEMA, { print: true });
      const handler = getRouteHandler(router, 'post', '/:name/value');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq({ name: 'temperature' }, { data: 21.5 }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(202);
      expect(jsonFn).toHaveBeenCalledWith({ queued: 'value' });

      loop.drain();
      expect(application.circuit.getValue(fact.getHandle())?.data).toBe(21.5);
    });

    it('should return 422 for data that does not match the schema', () => {
      application.createFact('temperature', NUMBER_SCHEMA);
      const handler = getRouteHandler(router, 'post', '/:name/value');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq({ name: 'temperature' }, { data: 'warm' }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(422);
      expect(jsonFn).toHaveBeenCalledWith({
        error: 'Data does not match schema number: value: Expected number, received string',
      });
      expect(application.circuit.queueLength()).toBe(0);
    });

    it('should return 404 for an unknown Fact', () => {
      const handler = getRouteHandler(router, 'post', '/:name/value');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq({ name: 'missing' }, { data: 1 }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(404);
      expect(jsonFn).toHaveBeenCalledWith({ error: 'No Fact named "missing"' });
    });

    it('should return 410 once the Emitter is gone', () => {
      const fact = application.createFact('temperature', NUMBER_SCHEMA);
      application.circuit.releaseEmitter(fact.getHandle());
      loop.drain();
      const handler = getRouteHandler(router, 'post', '/:name/value');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq({ name: 'temperature' }, { data: 1 }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(410);
      expect(jsonFn).toHaveBeenCalledWith({ error: 'Fact "temperature" is no longer valid' });
    });
  });

  describe('POST /:name/failure and /:name/completion', () => {
    it('should queue a failure', () => {
      const fact = application.createFact('temperature', NUMBER_SCHEMA);
      const handler = getRouteHandler(router, 'post', '/:name/failure');
      const { res, statusFn } = createMockRes();

      handler(mockReq({ name: 'temperature' }, { message: 'sensor offline' }), res as Response);
      loop.drain();

      expect(statusFn).toHaveBeenCalledWith(202);
      expect(application.circuit.getStatus(fact.getHandle())).toBe(EmitterStatus.FAILED);
    });

    it('should return 400 for a failure without a message', () => {
      application.createFact('temperature', NUMBER_SCHEMA);
      const handler = getRouteHandler(router, 'post', '/:name/failure');
      const { res, statusFn } = createMockRes();

      handler(mockReq({ name: 'temperature' }, {}), res as Response);

      expect(statusFn).toHaveBeenCalledWith(400);
    });

    it('should queue a completion', () => {
      application.createFact('temperature', NUMBER_SCHEMA);
      const handler = getRouteHandler(router, 'post', '/:name/completion');
      const { res, statusFn, jsonFn } = createMockRes();

      handler(mockReq({ name: 'temperature' }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(202);
      expect(jsonFn).toHaveBeenCalledWith({ queued: 'completion' });
      expect(application.circuit.queueLength()).toBe(1);
    });
  });

  describe('DELETE /:name', () => {
    it('should remove a Fact', () => {
      application.createFact('temperature', NUMBER_SCHEMA);
      const handler = getRouteHandler(router, 'delete', '/:name');
      const { res, statusFn, sendFn } = createMockRes();

      handler(mockReq({ name: 'temperature' }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(204);
      expect(sendFn).toHaveBeenCalled();
      expect(application.getFact('temperature')).toBeNull();
    });

    it('should return 404 for an unknown Fact', () => {
      const handler = getRouteHandler(router, 'delete', '/:name');
      const { res, statusFn } = createMockRes();

      handler(mockReq({ name: 'missing' }), res as Response);

      expect(statusFn).toHaveBeenCalledWith(404);
    });
  });
});
