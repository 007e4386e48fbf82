/**
 * Input DTOs, validated with class-validator before they reach the engine
 */

export * from './register-shipment.dto';
export * from './ingest-raw-event.dto';
export * from './automation-rule.dto';
export * from './validators';
export * from './validate-input';
