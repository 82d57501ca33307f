import { BadRequestException, Controller, Get, Param, Query } from "@nestjs/common";
import { isFinalStatus } from "../runtime/store";
import { WorkflowService } from "./workflow.service";

@Controller("/internal/runs")
export class RunsController {
  constructor(private readonly svc: WorkflowService) {}

  @Get("")
  async list(
    @Query("workflowName") workflowName?: string,
    @Query("finalStatus") finalStatus?: string,
    @Query("limit") limit?: string,
    @Query("offset") offset?: string,
  ) {
    if (finalStatus !== undefined && !isFinalStatus(finalStatus)) {
      throw new BadRequestException("finalStatus must be SUCCEEDED or FAILED");
    }
    return this.svc.listRuns({ workflowName, finalStatus, limit: Number(limit), offset: Number(offset) });
  }

  @Get("/:runId")
  async get(@Param("runId") runId: string) {
    return this.svc.getRun(runId);
  }
}
