/**
 * unplugin-pickler: Bundler integrations for pickler
 *
 * - Vite: `unplugin-pickler/vite`
 * - Webpack: `unplugin-pickler/webpack`
 * - esbuild: `unplugin-pickler/esbuild`
 * - Rollup: `unplugin-pickler/rollup`
 *
 * Each plugin expands `deriveReadWriter<T>()` calls during the build.
 *
 * @example
 * ```ts
 * // vite.config.ts
 * import pickler from "unplugin-pickler/vite";
 *
 * export default {
 *   plugins: [pickler()],
 * };
 * ```
 */

export {
  unplugin,
  unpluginFactory,
  shouldTransform,
  findTsConfig,
  reportDiagnostics,
  type PicklerPluginOptions,
} from "./unplugin.js";
