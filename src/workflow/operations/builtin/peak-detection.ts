import { OperationHandler, ParamSpec } from "../types";
import { buildRequest, validateParams } from "../params";

const PARAMS: ParamSpec[] = [
  { name: "csv_id", type: { kind: "string" }, required: true },
  { name: "x_col", type: { kind: "column" }, defaultValue: "voltage" },
  { name: "y_col", type: { kind: "column" }, defaultValue: "current" },
  { name: "prominence", type: { kind: "number" }, defaultValue: 0.02 },
  { name: "height", type: { kind: "number" } },
  { name: "distance", type: { kind: "integer" } },
  { name: "width", type: { kind: "integer" } },
  { name: "threshold", type: { kind: "number" } },
];

export const PeakDetectionV1: OperationHandler = {
  type: "uo_sdl2_peak_detection",
  kind: "peak_detection",
  meta: {
    title: "Peak Detection",
    description: "Finds forward and reverse scan peaks in a stored CSV",
    params: PARAMS,
    outputs: { description: "CSV record listing the detected peaks" },
  },
  validate: (operationId, params) => validateParams(PARAMS, operationId, params),
  toRemoteRequest: (params) => buildRequest(PARAMS, params),
};
