/**
 * The eight axis registries, built once when this module loads.
 *
 * Priority order inside each table is behavior: moving a label changes which
 * label wins for overlapping text, so edit the JSON tables deliberately.
 */
import { defineAxisRegistry } from "./axis-registry";
import { AxisName, AxisRegistry } from "./types";

import modifierTable from "./data/registries/modifier.json";
import complicationTable from "./data/registries/complication.json";
import etiologyTable from "./data/registries/etiology.json";
import stageTable from "./data/registries/stage.json";
import lateralityTable from "./data/registries/laterality.json";
import locationTable from "./data/registries/location.json";
import temporalTable from "./data/registries/temporal.json";
import contextTable from "./data/registries/context.json";

export const MODIFIER_REGISTRY = defineAxisRegistry(modifierTable);
export const COMPLICATION_REGISTRY = defineAxisRegistry(complicationTable);
export const ETIOLOGY_REGISTRY = defineAxisRegistry(etiologyTable);
export const STAGE_REGISTRY = defineAxisRegistry(stageTable);
export const LATERALITY_REGISTRY = defineAxisRegistry(lateralityTable);
export const LOCATION_REGISTRY = defineAxisRegistry(locationTable);
export const TEMPORAL_REGISTRY = defineAxisRegistry(temporalTable);
export const CONTEXT_REGISTRY = defineAxisRegistry(contextTable);

export const AXIS_REGISTRIES: Readonly<Record<AxisName, AxisRegistry>> = Object.freeze({
  modifier: MODIFIER_REGISTRY,
  complication: COMPLICATION_REGISTRY,
  etiology: ETIOLOGY_REGISTRY,
  stage: STAGE_REGISTRY,
  laterality: LATERALITY_REGISTRY,
  location: LOCATION_REGISTRY,
  temporal: TEMPORAL_REGISTRY,
  context: CONTEXT_REGISTRY,
});
