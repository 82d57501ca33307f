import { UnsupportedOperationError } from "../../runtime/errors";
import { OperationCatalogEntry, OperationHandler } from "./types";

export class OperationRegistry {
  private map = new Map<string, OperationHandler>();

  register(h: OperationHandler) {
    if (this.map.has(h.type)) throw new Error(`OPERATION_HANDLER_DUPLICATE ${h.type}`);
    this.map.set(h.type, h);
    return this;
  }

  has(type: string): boolean {
    return this.map.has(type);
  }

  createHandler(type: string): OperationHandler {
    const h = this.map.get(type);
    if (!h) throw new UnsupportedOperationError(type);
    return h;
  }

  /** Every registered operation, sorted by type so clients get a stable listing. */
  catalog(): OperationCatalogEntry[] {
    return [...this.map.values()]
      .map((h) => ({ type: h.type, kind: h.kind, meta: h.meta }))
      .sort((a, b) => a.type.localeCompare(b.type));
  }
}
