type HealthCheckResult = { status: "ok" | "error"; details?: string };
type HealthCheckedClient = { healthCheck: () => Promise<HealthCheckResult> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  getQdrantClient: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient: () => Promise<void>;
}

async function getClientModules(): Promise<ClientLifecycleModules> {
  const [openaiModule, qdrantModule] = await Promise.all([
    import("./openai.js"),
    import("./qdrant.js")
  ]);

  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient,
    getQdrantClient: qdrantModule.getQdrantClient,
    shutdownQdrantClient: qdrantModule.shutdownQdrantClient
  };
}

export interface ClientHealthReport {
  openai: HealthCheckResult;
  qdrant: HealthCheckResult;
}

export async function initializeClients(
  loadClientModules: () => Promise<ClientLifecycleModules> = getClientModules
): Promise<ClientHealthReport> {
  const clients = await loadClientModules();
  const [openai, qdrant] = await Promise.all([
    clients.getOpenAIClient().then((client) => client.healthCheck()),
    clients.getQdrantClient().then((client) => client.healthCheck())
  ]);
  return { openai, qdrant };
}

export async function shutdownClients(
  loadClientModules: () => Promise<ClientLifecycleModules> = getClientModules
): Promise<void> {
  const clients = await loadClientModules();
  console.info("[lifecycle] shutting down infrastructure clients");
  await Promise.allSettled([clients.shutdownQdrantClient(), clients.shutdownOpenAIClient()]);
}
