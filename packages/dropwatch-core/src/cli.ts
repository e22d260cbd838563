import {loadEnvConfig, DropwatchSettings} from "./config/EnvConfig.js";
import {describeError, RegistryCorruptionError} from "./errors/WatchErrors.js";
import {createCommandProcessor} from "./logic/CommandProcessor.js";
import {ProcessingCallback, succeeded} from "./logic/ProcessingCallback.js";
import {WatchController} from "./logic/WatchController.js";

console.log(`BUILD_VERSION: ${process.env.BUILD_VERSION || 'dev'}`);

const controller = new WatchController();
let shuttingDown = false;

function printConfig(settings: DropwatchSettings): void {
    const watch = settings.watch;
    console.log('[Startup] Configuration:');
    console.log(`  - input directory: ${watch.inputDirectory}${watch.recursive ? ' (recursive)' : ''}`);
    console.log(`  - extensions: ${Array.from(watch.acceptedExtensions).join(' ')}`);
    console.log(`  - discovery: ${watch.discoveryMode}, poll ${watch.pollIntervalSeconds}s, debounce ${watch.debounceSeconds}s`);
    console.log(`  - registry: ${watch.registryFilePath}`);
    console.log(`  - command: ${settings.command ? [settings.command.command, ...(settings.command.args ?? [])].join(' ') : '(none, files are only recorded)'}`);
}

function recordOnly(): ProcessingCallback {
    return (filePath: string) => {
        console.log(`[Processor] No command configured, recording ${filePath}`);
        return succeeded({recordedOnly: true});
    };
}

async function shutdown(signal: string, stopTimeoutMs: number): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    console.log(`\n[Shutdown] ${signal} received, stopping (waiting up to ${stopTimeoutMs}ms for the running file)...`);
    const report = await controller.stop(stopTimeoutMs);
    if (report.forced) {
        console.warn(`[Shutdown] Abandoned ${report.abandoned ?? 'a running callback'}; it is flagged for review in the registry`);
    }
    console.log('[Shutdown] Stopped');
    process.exit(0);
}

controller.subscribe(event => {
    switch (event.type) {
        case 'state':
            console.log(`[Watcher] state: ${event.state}${event.paused ? ' (paused)' : ''}`);
            break;
        case 'started':
            console.log(`[Watcher] processing ${event.path}`);
            break;
        case 'discovery-failed':
            console.error(`[Watcher] ${event.error.message}`);
            process.exitCode = 1;
            break;
        default:
            break;
    }
});

(async () => {
    let settings: DropwatchSettings;
    try {
        settings = await loadEnvConfig();
    } catch (error) {
        console.error(`[Startup] ERROR: ${describeError(error)}`);
        console.error('[Startup] Example: DROPWATCH_INPUT_DIRECTORY=/data/incoming');
        process.exit(1);
    }
    printConfig(settings);

    const callback = settings.command ? createCommandProcessor(settings.command) : recordOnly();

    const onSignal = (signal: string) => {
        shutdown(signal, settings.stopTimeoutMs).catch((error: unknown) => {
            console.error(`[Shutdown] Error while stopping:`, describeError(error));
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    try {
        await controller.start(settings.watch, callback);
    } catch (error) {
        console.error(`[Startup] ERROR: ${describeError(error)}`);
        if (error instanceof RegistryCorruptionError) {
            console.error(`[Startup] Inspect the file, or move it aside (ProcessedRegistry.discardCorrupt) to start with an empty registry: ${settings.watch.registryFilePath}`);
        }
        process.exit(1);
    }

    const counts = controller.getRegistryCounts();
    console.log(`[Startup] Registry: ${Object.entries(counts).map(([status, count]) => `${status}=${count}`).join(', ')}`);
})().catch((error: unknown) => {
    console.error('[Startup] Unexpected error:', error);
    process.exit(1);
});

