/**
 * Reverse-proxy local root CA capture
 */

import * as path from "node:path";
import { copyFromContainer } from "../../docker/container";
import type { CertsConfig } from "../../types";
import { logger } from "../../utils/logger";

/**
 * Copy the proxy's root certificate into `certsDir`. Returns the copied
 * path, or null when the container or certificate is absent.
 */
export async function collectRootCertificate(
  certs: CertsConfig,
  certsDir: string,
): Promise<string | null> {
  const destination = path.join(certsDir, certs.fileName);

  if (!(await copyFromContainer(certs.container, certs.path, destination))) {
    logger.warn(`No root CA copied from ${certs.container}:${certs.path}`);
    return null;
  }

  return destination;
}
