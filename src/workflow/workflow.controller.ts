import { Body, Controller, HttpCode, Post } from "@nestjs/common";
import { WorkflowService } from "./workflow.service";

@Controller("/internal/workflows")
export class WorkflowController {
  constructor(private readonly svc: WorkflowService) {}

  // body: the workflow document itself
  @Post("/run")
  @HttpCode(200)
  async run(@Body() body: unknown) {
    return this.svc.run(body);
  }

  @Post("/validate")
  @HttpCode(200)
  validate(@Body() body: unknown) {
    return this.svc.validate(body);
  }
}
