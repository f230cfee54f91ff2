/**
 * Fact gateway: lets external processes create, drive and remove named
 * Facts. Everything here only queues events; the event loop does the rest.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { type Application } from '../app';
import { type Fact, formatStatus } from '../circuit';
import { formatHandle } from '../data';
import { SchemaInputSchema, schemaFromInput, schemaToInput, createValue } from '../value';

// ── Request bodies ──────────────────────────────────────────────────

const FactNameSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_.-]+$/, 'Only letters, digits, "_", "." and "-" are allowed');

export const CreateFactBodySchema = z
  .object({
    name: FactNameSchema,
    schema: SchemaInputSchema,
    blockable: z.boolean().default(false),
    print: z.boolean().default(false),
  })
  .strict();

export const EmitValueBodySchema = z.object({ data: z.unknown() }).strict();

export const EmitFailureBodySchema = z.object({ message: z.string().min(1) }).strict();

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

// ── Router ──────────────────────────────────────────────────────────

export function createFactsRouter(application: Application): Router {
  const router = Router();
  const { circuit } = application;

  function describeFact(name: string, fact: Fact) {
    const handle = fact.getHandle();
    const valid = fact.isValid();

    return {
      name,
      schema: schemaToInput(fact.getSchema()),
      handle: formatHandle(handle),
      valid,
      status: valid ? formatStatus(circuit.getStatus(handle)) : null,
      value: valid ? circuit.getValue(handle)?.data ?? null : null,
    };
  }

  /** Look up the Fact named in the path; answers 404/410 itself and returns null if unusable. */
  function resolveFact(req: Request, res: Response): Fact | null {
    const { name } = req.params;
    const fact = application.getFact(name);

    if (fact === null) {
      res.status(404).json({ error: `No Fact named "${name}"` });
      return null;
    }

    if (!fact.isValid()) {
      res.status(410).json({ error: `Fact "${name}" is no longer valid` });
      return null;
    }

    return fact;
  }

  router.get('/', (req: Request, res: Response) => {
    const facts = application.listFacts().map((entry) => ({
      ...describeFact(entry.name, entry.fact),
      createdAt: new Date(entry.createdAt).toISOString(),
    }));

    res.status(200).json({ facts });
  });

  router.post('/', (req: Request, res: Response) => {
    const parsed = CreateFactBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    const { name, schema, blockable, print } = parsed.data;
    if (application.getFact(name) !== null) {
      res.status(409).json({ error: `A Fact named "${name}" already exists` });
      return;
    }

    const fact = application.createFact(name, schemaFromInput(schema), { blockable, print });
    res.status(201).json(describeFact(name, fact));
  });

  router.post('/:name/value', (req: Request, res: Response) => {
    const parsed = EmitValueBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    const fact = resolveFact(req, res);
    if (fact === null) return;

    const value = createValue(fact.getSchema(), parsed.data.data);
    if (!value.ok) {
      res.status(422).json({ error: value.message });
      return;
    }

    const error = fact.emitValue(value.value);
    if (error !== null) {
      res.status(422).json({ error: error.message });
      return;
    }

    res.status(202).json({ queued: 'value' });
  });

  router.post('/:name/failure', (req: Request, res: Response) => {
    const parsed = EmitFailureBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    const fact = resolveFact(req, res);
    if (fact === null) return;

    fact.emitFailure(new Error(parsed.data.message));
    res.status(202).json({ queued: 'failure' });
  });

  router.post('/:name/completion', (req: Request, res: Response) => {
    const fact = resolveFact(req, res);
    if (fact === null) return;

    fact.emitCompletion();
    res.status(202).json({ queued: 'completion' });
  });

  router.delete('/:name', (req: Request, res: Response) => {
    const { name } = req.params;

    if (!application.removeFact(name)) {
      res.status(404).json({ error: `No Fact named "${name}"` });
      return;
    }

    res.status(204).send();
  });

  return router;
}
