export * from "./schema/observation_v1";
export * from "./schema/soil_profile_v1";
export * from "./schema/cwsi_baseline_v1";
export * from "./schema/irrigation_event_v1";
export * from "./schema/water_balance_state_v1";
export * from "./schema/decision_record_v1";
export * from "./schema/engine_config_v1";
