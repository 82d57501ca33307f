import { OperationHandler, ParamSpec } from "../types";
import { buildRequest, validateParams } from "../params";

const PARAMS: ParamSpec[] = [
  { name: "csv_id", type: { kind: "string" }, required: true, description: "Id of the CSV to smooth" },
  { name: "x_col", type: { kind: "column" }, defaultValue: "time" },
  { name: "y_col", type: { kind: "column" }, defaultValue: "current" },
  { name: "window_size", type: { kind: "integer" }, defaultValue: 20 },
  { name: "min_periods", type: { kind: "integer" } },
];

export const RollingMeanV1: OperationHandler = {
  type: "uo_sdl2_rolling_mean",
  kind: "rolling_mean",
  meta: {
    title: "Rolling Mean",
    description: "Smooths one column of a stored CSV with a moving average",
    params: PARAMS,
    outputs: { description: "CSV record of the processed trace" },
  },
  validate: (operationId, params) => validateParams(PARAMS, operationId, params),
  toRemoteRequest: (params) => buildRequest(PARAMS, params),
};
