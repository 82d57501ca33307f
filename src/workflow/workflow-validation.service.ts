import { Injectable } from "@nestjs/common";
import { DuplicateOperationIdError, UnknownReferenceError, UnsupportedOperationError, WorkflowError } from "../runtime/errors";
import { assertUniqueOperationIds } from "../runtime/engine";
import { JsonObject, ParamValue, Workflow } from "../runtime/types";
import { collectReferences, resolveValue } from "../runtime/value";
import { OperationRegistry } from "./operations/registry";

export type WorkflowIssue = {
  code: string;
  message: string;
  operationId?: string;
  path?: string; // e.g. operations[peaks].params.csv_id
};

export type WorkflowValidationResult = {
  ok: boolean;
  errors: WorkflowIssue[];
};

function issue(e: WorkflowError, extras?: Partial<WorkflowIssue>): WorkflowIssue {
  return { code: e.code, message: e.message, ...extras };
}

/**
 * Dry run: reports what the engine would reject without contacting the task service.
 * Parameters fed by references are only checked for presence; their values exist at run time only.
 */
@Injectable()
export class WorkflowValidationService {
  constructor(private readonly registry: OperationRegistry) {}

  validate(workflow: Workflow): WorkflowValidationResult {
    const errors: WorkflowIssue[] = [];

    try {
      assertUniqueOperationIds(workflow);
    } catch (e) {
      if (!(e instanceof DuplicateOperationIdError)) throw e;
      errors.push(issue(e, { path: "operations" }));
    }

    const declared = new Set<string>();
    for (const op of workflow.operations) {
      const base = `operations[${op.id}]`;

      const referenced = new Set<string>();
      for (const [name, value] of Object.entries(op.params)) {
        for (const ref of collectReferences(value)) {
          referenced.add(name);
          if (!declared.has(ref.operationId)) {
            errors.push(
              issue(new UnknownReferenceError(ref.raw, ref.operationId), { operationId: op.id, path: `${base}.params.${name}` }),
            );
          }
        }
      }

      if (!this.registry.has(op.type)) {
        errors.push(issue(new UnsupportedOperationError(op.type), { operationId: op.id, path: `${base}.type` }));
      } else {
        const literals = literalParams(op.params, referenced);
        const handler = this.registry.createHandler(op.type);
        for (const e of handler.validate(op.id, literals).errors) {
          if (referenced.has(e.paramName)) continue;
          errors.push(issue(e, { operationId: op.id, path: `${base}.params.${e.paramName}` }));
        }
      }

      declared.add(op.id);
    }

    return { ok: errors.length === 0, errors };
  }
}

function literalParams(params: Record<string, ParamValue>, referenced: Set<string>): JsonObject {
  const out: JsonObject = {};
  for (const [name, value] of Object.entries(params)) {
    if (referenced.has(name)) continue;
    out[name] = resolveValue(value, new Map());
  }
  return out;
}
