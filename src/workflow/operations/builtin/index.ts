import { OperationRegistry } from "../registry";
import { CyclicVoltammetryV1 } from "./cv";
import { RollingMeanV1 } from "./rolling-mean";
import { PeakDetectionV1 } from "./peak-detection";
import { PumpTransferV1 } from "./pump-transfer";
import { ComplexationV1 } from "./complexation";

export function createBuiltinRegistry() {
  return new OperationRegistry()
    .register(CyclicVoltammetryV1)
    .register(RollingMeanV1)
    .register(PeakDetectionV1)
    .register(PumpTransferV1)
    .register(ComplexationV1);
}
