import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { WorkflowError } from "../runtime/errors";
import { JsonObject, isJsonObject } from "../runtime/types";

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_WORKFLOW_DOCUMENT: 400,
  DUPLICATE_OPERATION_ID: 400,
  UNSUPPORTED_OPERATION: 400,
  RUN_NOT_FOUND: 404,
};

type Body = {
  statusCode: number;
  code: string;
  message: string;
  details?: JsonObject;
};

function fromHttpException(e: HttpException): Body {
  const status = e.getStatus();
  const r = e.getResponse();
  // Nest puts a string, an array of strings or an object in `message`
  const raw = isJsonObject(r) ? r.message : r;
  const message = Array.isArray(raw) ? raw.join("; ") : typeof raw === "string" ? raw : e.message;
  const code = isJsonObject(r) && typeof r.code === "string" ? r.code : "HTTP_EXCEPTION";
  return { statusCode: status, code, message };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request>();

    const debug = process.env.NODE_ENV === "test" || process.env.LABFLOW_DEBUG_ERRORS === "1";

    let body: Body;
    if (exception instanceof HttpException) {
      body = fromHttpException(exception);
    } else if (exception instanceof WorkflowError) {
      // workflow errors are the caller's business: message and details are always returned
      body = {
        statusCode: STATUS_BY_CODE[exception.code] ?? 500,
        code: exception.code,
        message: exception.message,
        details: exception.details,
      };
    } else {
      const msg = exception instanceof Error ? exception.message : String(exception);
      this.logger.error(`unhandled error on ${req.method} ${req.originalUrl || req.url}: ${msg}`);
      // unknown errors keep their message hidden outside debug
      body = { statusCode: 500, code: "INTERNAL_ERROR", message: debug ? msg : "Internal server error" };
    }

    res.status(body.statusCode).json({
      ...body,
      path: req.originalUrl || req.url,
      timestamp: new Date().toISOString(),
    });
  }
}
