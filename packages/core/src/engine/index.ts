export { Name, nameUnit, nameOfStr, nameOfUsize, namePair, nameFork } from './name';
export { Art, put, force } from './art';
export { Engine, createEngine, type EngineOptions, type EngineStats } from './engine';
