import { FaucetError } from "../handlers/errors.js";
import { log } from "../handlers/log.js";
import type { NodeClient } from "../types/index.js";
import type { KaspaNetwork } from "../utils/helperFunctions.js";

/**
 * Stops startup when the node serves a different network than the faucet
 * is configured for. An unreachable node fails startup as well.
 */
export async function assertNodeNetwork(node: NodeClient, expected: KaspaNetwork): Promise<void> {
  const reported = await node.getNetwork();

  if (reported !== expected) {
    throw new FaucetError({
      message: `Node is not on ${expected} (it reports ${reported}); check KASPAD_URL and KASPA_NETWORK`,
      code: "CONFIG_INVALID",
    });
  }

  log(`Node network confirmed: ${reported}`, "info");
}
