export { ControlRepository } from './control-repository.js';
export { ControlService } from './control-service.js';
export type {
  ControlServiceDependencies,
  ControlStatus,
  EmergencyRescueParams,
} from './control-service.js';
