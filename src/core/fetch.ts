import { Agent } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

/**
 * Dispatcher for outbound HTTP calls (event sink, sentiment service). Only returns an
 * agent when certificate checks are switched off; otherwise undici's global dispatcher is used.
 */
export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export async function closeFetchDispatcher(): Promise<void> {
  if (!insecureAgent) {
    return;
  }
  const agent = insecureAgent;
  insecureAgent = undefined;
  await agent.close();
}
