import { OperationHandler, ParamSpec } from "../types";
import { buildRequest, validateParams } from "../params";

const PARAMS: ParamSpec[] = [
  {
    name: "v_range",
    type: { kind: "numberTuple", length: 2 },
    required: true,
    description: "Start and end potential of the sweep, in volts",
  },
  { name: "freq", type: { kind: "number" }, required: true, description: "Scan frequency in Hz" },
];

export const CyclicVoltammetryV1: OperationHandler = {
  type: "uo_sdl2_cv",
  kind: "cv",
  meta: {
    title: "Cyclic Voltammetry",
    description: "Runs a CV sweep on the potentiostat and stores the raw trace as CSV",
    params: PARAMS,
    outputs: { description: "CSV record of the raw trace; `output.id` feeds the processing steps" },
  },
  validate: (operationId, params) => validateParams(PARAMS, operationId, params),
  toRemoteRequest: (params) => buildRequest(PARAMS, params),
};
