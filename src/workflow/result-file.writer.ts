import { Injectable, Logger } from "@nestjs/common";
import { promises as fs } from "fs";
import * as path from "path";
import { SchemaValidationService, formatSchemaError } from "../common/schema-validation.service";
import { WorkflowResult } from "../runtime/types";

@Injectable()
export class ResultFileWriter {
  private readonly logger = new Logger(ResultFileWriter.name);

  constructor(private readonly schemas: SchemaValidationService) {}

  async write(file: string, result: WorkflowResult): Promise<string> {
    const check = this.schemas.validateWorkflowResult(result);
    if (!check.ok) {
      throw new Error(`RESULT_SCHEMA_INVALID ${check.errors.map(formatSchemaError).join("; ")}`);
    }

    const abs = path.resolve(file);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, `${JSON.stringify(result, null, 2)}\n`, "utf8");
    this.logger.log(`saved result of "${result.workflowName}" to ${abs}`);
    return abs;
  }
}
