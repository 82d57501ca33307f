import { Module } from "@nestjs/common";
import { MockTaskController } from "./mock-task.controller";
import { MockTaskService } from "./mock-task.service";

@Module({
  controllers: [MockTaskController],
  providers: [MockTaskService],
  exports: [MockTaskService],
})
export class MockModule {}
