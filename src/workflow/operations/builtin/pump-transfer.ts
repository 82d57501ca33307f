import { OperationHandler, ParamSpec } from "../types";
import { buildRequest, validateParams } from "../params";

const PARAMS: ParamSpec[] = [
  { name: "source", type: { kind: "integer" }, required: true, description: "Source vial position" },
  { name: "target", type: { kind: "integer" }, required: true, description: "Target vial position" },
];

export const PumpTransferV1: OperationHandler = {
  type: "uo_sdl2_pump_transfer",
  kind: "pump",
  meta: {
    title: "Pump Transfer",
    description: "Moves liquid between two vial positions",
    params: PARAMS,
  },
  validate: (operationId, params) => validateParams(PARAMS, operationId, params),
  toRemoteRequest: (params) => buildRequest(PARAMS, params),
};
