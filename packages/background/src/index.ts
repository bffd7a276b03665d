export { getStartAndEndTimes, randomInt, type WindowOptions } from './window.js';
export {
  loadBackgroundCatalog,
  parseBackgroundCatalog,
  pickBackground,
  backgroundPath,
  resolveBackgroundPath,
  DEFAULT_CATALOG_DIR,
  type BackgroundCatalog,
} from './catalog.js';
export {
  BackgroundChopper,
  SOURCE_HEADROOM,
  type ChopperOptions,
  type ChopperDeps,
  type ChopSelection,
  type ChopResult,
  type AudioChop,
} from './chopper.js';
