import type { FastifyInstance } from "fastify";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<{ status: string; details?: string }> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
}

async function getClientModules(): Promise<ClientLifecycleModules> {
  const openaiModule = await import("./openai.js");
  return {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient
  };
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  /** Runs once before the app starts serving, e.g. restoring the cache snapshot. */
  onReady?: () => Promise<void>;
  /** Runs on close and on SIGINT/SIGTERM, before clients are shut down. */
  onShutdown?: () => Promise<void>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

async function shutdownAll(
  logPrefix: string,
  loadClientModules: () => Promise<ClientLifecycleModules>,
  onShutdown: (() => Promise<void>) | undefined
): Promise<void> {
  console.info(`${logPrefix} shutting down`);
  if (onShutdown) {
    await onShutdown();
  }
  const clients = await loadClientModules();
  await clients.shutdownOpenAIClient();
}

export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? process.env.ENABLE_INFRA_BOOTSTRAP === "true";
  const loadClientModules = options?.loadClientModules ?? getClientModules;
  const onShutdown = options?.onShutdown;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    if (options?.onReady) {
      await options.onReady();
    }
    if (!enableBootstrap) {
      app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
      return;
    }
    const clients = await loadClientModules();
    const health = await (await clients.getOpenAIClient()).healthCheck();
    if (health.status !== "ok") {
      throw new Error(`OpenAI health check failed: ${health.details ?? "unknown error"}`);
    }
    app.log.info("Infrastructure singletons initialized and health checked");
  });

  app.addHook("onClose", async () => {
    await shutdownAll("[lifecycle/onClose]", loadClientModules, onShutdown);
  });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
      console.info(`[lifecycle/process] received ${signal}`);
      await shutdownAll("[lifecycle/process]", loadClientModules, onShutdown);
      exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        handleSignal(signal).catch((error: unknown) => {
          console.error(`[lifecycle/process] shutdown after ${signal} failed`, error);
          exit(1);
        });
      });
    }
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
