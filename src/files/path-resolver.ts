/**
 * Path Resolver - Locates designs on the host and maps them into the container
 */

import { join, resolve, normalize, isAbsolute, dirname } from "path";
import { fileURLToPath } from "url";

// Get __dirname equivalent for ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Repository root (two levels up from src/files/)
const FLOW_ROOT = resolve(__dirname, "..", "..");

/**
 * Path configuration
 */
export interface PathConfig {
  hostDesignsDir: string;       // Host path to the designs directory
  containerDesignsDir: string;  // Same directory as mounted in the container
}

const defaultConfig: PathConfig = {
  hostDesignsDir: process.env.FLOW_DESIGNS_DIR || join(FLOW_ROOT, "designs"),
  containerDesignsDir: process.env.FLOW_CONTAINER_DESIGNS_DIR || "/workspace/designs",
};

/**
 * PathResolver handles design lookup and host/container translation
 */
class PathResolver {
  private config: PathConfig;

  constructor(config: Partial<PathConfig> = {}) {
    this.config = { ...defaultConfig, ...config };
  }

  getHostDesignsDir(): string {
    return resolve(this.config.hostDesignsDir);
  }

  /**
   * Resolve a design given by name (under the designs directory) or by path
   */
  resolveDesignDir(design: string): string {
    if (isAbsolute(design)) {
      return normalize(design);
    }
    return join(this.getHostDesignsDir(), design);
  }

  /**
   * Convert a host path inside the designs directory to its container path
   */
  hostToContainer(hostPath: string): string {
    const normalizedHostPath = normalize(resolve(hostPath));
    const designsDir = normalize(this.getHostDesignsDir());

    if (!normalizedHostPath.startsWith(designsDir)) {
      throw new Error(
        `Path ${hostPath} is not within the designs directory ${this.config.hostDesignsDir}`
      );
    }

    const relativePath = normalizedHostPath.slice(designsDir.length);
    return this.config.containerDesignsDir + relativePath.replace(/\\/g, "/");
  }

  /**
   * The design's OpenLane configuration file
   */
  getConfigPath(designDir: string): string {
    return join(designDir, "config.json");
  }

  /**
   * Directory OpenLane writes its run directories into
   */
  getRunsDir(designDir: string): string {
    return join(designDir, "runs");
  }
}

// Export singleton instance
export const pathResolver = new PathResolver();

// Export class for custom configurations
export { PathResolver, FLOW_ROOT };
