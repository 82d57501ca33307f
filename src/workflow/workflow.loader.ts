import { Injectable } from "@nestjs/common";
import { promises as fs } from "fs";
import { SchemaError, SchemaValidationService, formatSchemaError } from "../common/schema-validation.service";
import { WorkflowDocumentError } from "../runtime/errors";
import { Workflow } from "../runtime/types";
import { parseParams } from "../runtime/value";

/** Turns workflow documents (parsed JSON or files) into immutable Workflows. */
@Injectable()
export class WorkflowLoader {
  constructor(private readonly schemas: SchemaValidationService) {}

  parseWorkflow(doc: unknown): Workflow {
    const errors: SchemaError[] = [];
    if (!this.schemas.isWorkflowDocument(doc, errors)) {
      throw new WorkflowDocumentError("does not match workflow.v1 schema", errors.map(formatSchemaError));
    }

    const workflow: Workflow = {
      name: doc.name,
      description: doc.description ?? "",
      operations: doc.operations.map((op) => ({
        id: op.id,
        type: op.type,
        params: parseParams(op.params ?? {}),
      })),
    };
    return deepFreeze(workflow);
  }

  async loadFile(file: string): Promise<Workflow> {
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (e) {
      throw new WorkflowDocumentError(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }

    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (e) {
      throw new WorkflowDocumentError(`${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return this.parseWorkflow(doc);
  }
}

function deepFreeze<T>(v: T): T {
  if (v && typeof v === "object") {
    for (const child of Object.values(v)) deepFreeze(child);
    Object.freeze(v);
  }
  return v;
}
