export { ElementTreeEngine, type ElementTreeEngineOptions } from './ElementTreeEngine';
