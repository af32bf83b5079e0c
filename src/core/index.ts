export { Machine, createMachine } from './machine';
export { StateStore } from './state-store';
export { StateActivator, statusLedValue, physicalSlot } from './activator';
export { HotkeyRouter } from './router';
export { loadProfileState, classifyBinding, bindingsFor } from './profile';
export { FatalError, IntegrityError, BootstrapError, EnvironmentError } from './errors';
