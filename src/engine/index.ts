export {
  type EngineSettings,
  type EngineInit,
  type Engine,
  createEngine,
} from './engine';

export {
  type EngineFactory,
  type EngineFactoryOptions,
  createEngineFactory,
} from './engineFactory';
