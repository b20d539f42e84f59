// @irrigate/decision-kernel
// Entry point exports for the irrigation decision core.

export * from "./errors";
export * from "./engine";
export * from "./ingest/observation_ingest";
export * from "./soil/texture_table";
export * from "./soil/soil_profile";
export * from "./water_balance/et_estimator";
export * from "./water_balance/water_balance_tracker";
export * from "./cwsi/vpd";
export * from "./cwsi/baseline_fit";
export * from "./cwsi/cwsi_calculator";
export * from "./decision/decision_engine";
export * from "./decision/moisture_status";
export * from "./zone/zone_unit";
export * from "./dispatch/alert_dispatch";
