#!/usr/bin/env node
import 'dotenv/config';
import { ChatController } from './core/chat-controller.js';
import { readConfig, resolveDatabasePath } from './config/json-config.js';
import { startRepl } from './interfaces/repl.js';
import { createModelAdapter, type ResolvedAdapter } from './services/model-adapter.js';
import { SessionStore } from './services/session-store.js';
import { ConfigurationError } from './types/model-adapter.js';
import { logThought } from './utils/logger.js';

async function main(): Promise<void> {
    const config = await readConfig();
    const modelId = process.argv[2] ?? config.models.defaultModel;

    let resolved: ResolvedAdapter;
    try {
        resolved = createModelAdapter(modelId, config);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`[Lodestar] ${error.message}`);
            for (const hint of error.hints) console.error(`  - ${hint}`);
            process.exitCode = 1;
            return;
        }
        throw error;
    }

    const sessionStore = new SessionStore(resolveDatabasePath(config));
    const controller = new ChatController({
        adapter: resolved.adapter,
        model: resolved.model,
        config,
        sessionStore,
    });

    void logThought(`[Lodestar] Session ${controller.sessionId} started on ${resolved.model.id}.`);
    console.log(`Lodestar: ${resolved.model.displayName}. Type /quit to exit.`);

    try {
        await startRepl(controller);
        await controller.whenIdle();
        await controller.saveSession();
    } finally {
        controller.dispose();
        sessionStore.close();
    }
}

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Lodestar] Fatal: ${message}`);
    void logThought(`[Lodestar] Fatal: ${message}`);
    process.exitCode = 1;
});
