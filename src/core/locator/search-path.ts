import type { SearchPathLayer, SearchPathLayers, SearchPathList } from '../models/index.js';

/** Layer order, highest priority first */
export const SEARCH_PATH_LAYER_ORDER: readonly SearchPathLayer[] = ['user', 'bundled', 'system', 'extra'];

/** Flatten layers into the frozen priority-ordered search path */
export function composeSearchPath(layers: SearchPathLayers): SearchPathList {
  return Object.freeze(SEARCH_PATH_LAYER_ORDER.flatMap((layer) => layers[layer]));
}

/** Each directory paired with the layer that contributed it, in priority order */
export function describeSearchPath(layers: SearchPathLayers): Array<{ layer: SearchPathLayer; dir: string }> {
  return SEARCH_PATH_LAYER_ORDER.flatMap((layer) => layers[layer].map((dir) => ({ layer, dir })));
}
