import { Injectable } from "@nestjs/common";
import * as fs from "fs";
import * as path from "path";
import Ajv2020, { ErrorObject, ValidateFunction } from "ajv/dist/2020";
import addFormats from "ajv-formats";
import { JsonObject } from "../runtime/types";

export type SchemaError = {
  source: string; // workflow / workflowResult
  path: string; // instancePath
  keyword?: string;
  message?: string;
};

export type WorkflowDocument = {
  name: string;
  description?: string;
  operations: Array<{ id: string; type: string; params?: JsonObject }>;
};

export type SchemaCheck = { ok: boolean; errors: SchemaError[] };

// the CLI may run from anywhere; fall back to the schemas shipped next to the sources
function locateSchema(file: string) {
  const candidates = [
    path.resolve(process.cwd(), "schemas", file),
    path.resolve(__dirname, "../../schemas", file),
    path.resolve(__dirname, "../../../schemas", file),
  ];
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) throw new Error(`SCHEMA_FILE_NOT_FOUND: ${file}`);
  return found;
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(locateSchema(file), "utf8"));
}

@Injectable()
export class SchemaValidationService {
  private readonly ajv: Ajv2020;
  private readonly workflow: ValidateFunction<WorkflowDocument>;
  private readonly workflowResult: ValidateFunction;

  constructor() {
    // Ajv2020 understands $schema=2020-12 natively
    this.ajv = new Ajv2020({
      allErrors: true,
      strict: false,
      allowUnionTypes: true,
    });
    addFormats(this.ajv);

    // compiled eagerly so a broken schema fails at startup
    this.workflow = this.ajv.compile<WorkflowDocument>(this.schema("workflow.v1.schema.json"));
    this.workflowResult = this.ajv.compile(this.schema("workflow-result.v1.schema.json"));
  }

  private schema(file: string): JsonObject {
    const s = readJson(file);
    if (typeof s !== "object" || s === null || Array.isArray(s)) throw new Error(`SCHEMA_FILE_INVALID: ${file}`);
    return Object.fromEntries(Object.entries(s));
  }

  private toErrors(source: string, errors?: ErrorObject[] | null): SchemaError[] {
    if (!errors || errors.length === 0) return [];
    return errors.map((e) => ({
      source,
      path: e.instancePath && e.instancePath.length > 0 ? e.instancePath : "/",
      keyword: e.keyword,
      message: e.message,
    }));
  }

  /** Type guard over the workflow document schema; `errors` receives the problems when it fails. */
  isWorkflowDocument(doc: unknown, errors: SchemaError[] = []): doc is WorkflowDocument {
    const ok = this.workflow(doc);
    if (!ok) errors.push(...this.toErrors("workflow", this.workflow.errors));
    return ok;
  }

  validateWorkflowResult(result: unknown): SchemaCheck {
    const ok = Boolean(this.workflowResult(result));
    return { ok, errors: ok ? [] : this.toErrors("workflowResult", this.workflowResult.errors) };
  }
}

export function formatSchemaError(e: SchemaError) {
  return `${e.path} ${e.message ?? e.keyword ?? "invalid"}`;
}
