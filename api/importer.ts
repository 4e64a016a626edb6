import { Request, Response, Router } from "express";
import { HTTP_STATUS, ImporterError, operatorMessage } from "../services/errors.js";
import type { PipelineDeps } from "../services/previewBuilder.js";
import { runImport, runPreview } from "../services/runImportPipeline.js";
import {
  ImportRequestSchema,
  PreviewRequestSchema,
  describeIssues,
  previewToWire,
  resultToWire
} from "./serializers.js";

export interface HandlerResponse {
  status: number;
  body: unknown;
}

function errorBody(err: ImporterError) {
  return { error: operatorMessage(err), kind: err.kind };
}

export async function previewHandler(deps: PipelineDeps, body: unknown): Promise<HandlerResponse> {
  const parsed = PreviewRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: { error: "Invalid request", kind: "InvalidRequest", details: describeIssues(parsed.error) }
    };
  }

  const run = await runPreview(deps, parsed.data.supplier, parsed.data.part_number);
  if (run.state === "error") {
    return { status: HTTP_STATUS[run.error.kind], body: errorBody(run.error) };
  }
  return { status: 200, body: previewToWire(run.preview) };
}

export async function importHandler(deps: PipelineDeps, body: unknown): Promise<HandlerResponse> {
  const parsed = ImportRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: { error: "Invalid request", kind: "InvalidRequest", details: describeIssues(parsed.error) }
    };
  }

  const run = await runImport(deps, {
    supplier: parsed.data.supplier,
    partNumber: parsed.data.part_number,
    overrides: parsed.data.overrides,
    flags: { purchaseable: parsed.data.purchaseable, trackable: parsed.data.trackable }
  });

  switch (run.state) {
    case "success":
      return { status: 201, body: resultToWire(run.result) };
    case "partial":
      return { status: HTTP_STATUS.PartialWriteFailure, body: resultToWire(run.result) };
    case "error":
      return {
        status: HTTP_STATUS[run.error.kind],
        body: {
          ...errorBody(run.error),
          result: run.result ? resultToWire(run.result) : null
        }
      };
  }
}

export function createImporterRouter(deps: PipelineDeps): Router {
  const router = Router();

  const wrap =
    (handler: (deps: PipelineDeps, body: unknown) => Promise<HandlerResponse>) =>
    async (req: Request, res: Response) => {
      try {
        const out = await handler(deps, req.body);
        res.status(out.status).json(out.body);
      } catch (err) {
        console.error("IMPORTER ERROR:", err);
        res.status(500).json({ error: err instanceof Error ? err.message : "Internal error" });
      }
    };

  router.post("/preview", wrap(previewHandler));
  router.post("/import", wrap(importHandler));

  return router;
}
