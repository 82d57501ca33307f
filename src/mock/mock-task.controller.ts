import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  UnauthorizedException,
} from "@nestjs/common";
import { JsonObject, isJsonObject } from "../runtime/types";
import { MockTaskService } from "./mock-task.service";

@Controller()
export class MockTaskController {
  constructor(private readonly tasks: MockTaskService) {}

  private authorize(key: string | undefined) {
    if (this.tasks.apiKey !== null && key !== this.tasks.apiKey) {
      throw new UnauthorizedException("invalid X-API-Key");
    }
  }

  @Post("/tasks/:kind")
  @HttpCode(201)
  submit(@Param("kind") kind: string, @Body() body: unknown, @Headers("x-api-key") key?: string) {
    this.authorize(key);
    const request: JsonObject = isJsonObject(body) ? body : {};
    return { taskId: this.tasks.submit(kind, request) };
  }

  @Get("/task/:taskId")
  read(@Param("taskId") taskId: string, @Headers("x-api-key") key?: string) {
    this.authorize(key);
    const doc = this.tasks.read(taskId);
    if (!doc) throw new NotFoundException(`task ${taskId} not found`);
    return doc;
  }
}
