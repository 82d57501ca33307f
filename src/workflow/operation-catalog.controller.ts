import { Controller, Get } from "@nestjs/common";
import { OperationRegistry } from "./operations/registry";

@Controller("/internal/operations")
export class OperationCatalogController {
  constructor(private readonly registry: OperationRegistry) {}

  @Get("/catalog")
  catalog() {
    return this.registry.catalog();
  }
}
