import 'dotenv/config';
import {
    buildRegistries,
    createBuiltinCallables,
    loadDialogConfigFile,
    SchemaRegistry,
} from '@parley/sdk';
import { loadConfig } from './config';
import { createPool, createRedis } from './db';
import { migrate } from './db/migrate';
import { DialogServiceImpl } from './grpc/dialog.service';
import { HealthService } from './grpc/health.service';
import { createGrpcServer, startGrpcServer } from './grpc/server';
import { CompletionClient, CompletionRouter } from './llm/completion-client';
import { EchoCompletionClient } from './llm/echo.client';
import { OpenAICompletionClient } from './llm/openai.client';
import { DialogRepository } from './repositories/dialog.repository';
import { MessageRepository } from './repositories/message.repository';
import { DialogRecovery, RedisBroadcaster } from './services';
import { WorkflowEngine } from './workflow/engine';
import type { Server } from '@grpc/grpc-js';

const TAG = '[parley]';

const config = loadConfig();

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);

pool.on('error', (err) => console.error(`${TAG} idle client error:`, err));

let recovery: DialogRecovery | null = null;
let grpcServer: Server | null = null;

function createCompletionClient(): CompletionClient {
    const echo = new EchoCompletionClient();
    if (config.defaultCompletion === 'echo') {
        return new CompletionRouter(echo);
    }
    if (!config.openaiApiKey) {
        throw new Error('DEFAULT_COMPLETION=openai requires OPENAI_API_KEY');
    }
    const openai = new OpenAICompletionClient({ apiKey: config.openaiApiKey, baseURL: config.openaiBaseUrl });
    return new CompletionRouter(openai, { echo });
}

async function main() {
    console.log(`${TAG} starting engine...`);

    const registries = buildRegistries(await loadDialogConfigFile(config.templatesPath));
    console.log(`${TAG} loaded ${registries.templates.list().length} templates from ${config.templatesPath}`);

    // Health checks
    await pool.query('SELECT 1');
    console.log(`${TAG} postgres connected`);

    await redis.ping();
    console.log(`${TAG} redis connected`);

    await migrate(pool);

    const store = new DialogRepository(pool);
    const engine = new WorkflowEngine({
        store,
        broadcaster: new RedisBroadcaster(redis, config.eventsChannel),
        templates: registries.templates,
        prompts: registries.prompts,
        completion: createCompletionClient(),
        callables: createBuiltinCallables(),
        schemas: new SchemaRegistry(),
        transcript: new MessageRepository(pool),
        options: {
            retryBaseDelayMs: config.retryBaseDelayMs,
            maxTransitions: config.maxTransitions,
            maxTransientRetries: config.maxTransientRetries,
            runtimeContext: { templates_path: config.templatesPath },
        },
    });

    // Compile every template up front so a broken one stops startup.
    for (const name of registries.templates.list()) {
        engine.graph(name);
    }

    // gRPC
    grpcServer = createGrpcServer(
        new DialogServiceImpl(engine, registries.templates),
        new HealthService(pool, redis),
    );
    await startGrpcServer(grpcServer, config.port);

    // Recovery
    recovery = new DialogRecovery(store, engine, {
        staleThresholdSeconds: config.recoveryStaleSeconds,
        intervalMs: config.recoveryIntervalMs,
    });
    recovery.start();

    console.log(`${TAG} engine ready`);
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve) => {
        server.tryShutdown((err) => {
            if (err) {
                console.error(`${TAG} graceful grpc shutdown failed, forcing:`, err);
                server.forceShutdown();
            }
            resolve();
        });
    });
}

async function shutdown(signal: string) {
    console.log(`${TAG} ${signal} received, shutting down...`);

    if (recovery) recovery.stop();
    if (grpcServer) await closeServer(grpcServer);

    await pool.end();
    await redis.quit();
    console.log(`${TAG} shutdown complete`);
    process.exit(0);
}

function onSignal(signal: string) {
    shutdown(signal).catch((err) => {
        console.error(`${TAG} shutdown failed:`, err);
        process.exit(1);
    });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

main().catch((err) => {
    console.error(`${TAG} fatal:`, err);
    process.exit(1);
});
