import { OperationHandler, ParamSpec } from "../types";
import { buildRequest, validateParams } from "../params";

export const BUFFERS = ["PH7", "PH3"] as const;
export const LIGANDS = ["L1", "L2"] as const;
export const METALS = ["V", "Fe", "Cu"] as const;

const PARAMS: ParamSpec[] = [
  { name: "buffer", type: { kind: "transfer", compounds: BUFFERS }, required: true },
  { name: "ligand", type: { kind: "transfer", compounds: LIGANDS }, required: true },
  { name: "metal", type: { kind: "transfer", compounds: METALS }, required: true },
];

export const ComplexationV1: OperationHandler = {
  type: "uo_sdl2_complexation",
  kind: "complexation",
  meta: {
    title: "Complexation",
    description: "Doses buffer, ligand and metal into the reaction vial",
    params: PARAMS,
  },
  validate: (operationId, params) => validateParams(PARAMS, operationId, params),
  toRemoteRequest: (params) => buildRequest(PARAMS, params),
};
