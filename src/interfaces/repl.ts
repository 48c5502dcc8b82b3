import * as readline from 'readline';
import type { ChatController } from '../core/chat-controller.js';
import type { ControllerEvent, TurnResult } from '../types/controller.js';
import type { TocEntry } from '../types/orchestration.js';
import { logThought } from '../utils/logger.js';

export type ReplCommand =
    | { kind: 'message'; text: string }
    | { kind: 'waypoint' }
    | { kind: 'regenerate' }
    | { kind: 'rollback' }
    | { kind: 'status' }
    | { kind: 'new' }
    | { kind: 'fork' }
    | { kind: 'save' }
    | { kind: 'artifacts' }
    | { kind: 'toc' }
    | { kind: 'export' }
    | { kind: 'side'; text: string }
    | { kind: 'endside'; merge: boolean }
    | { kind: 'quit' }
    | { kind: 'unknown'; name: string }
    | { kind: 'empty' };

const SIMPLE_COMMANDS = [
    'waypoint', 'regenerate', 'rollback', 'status', 'new', 'fork', 'save', 'artifacts', 'toc', 'export', 'quit',
] as const;
type SimpleCommand = (typeof SIMPLE_COMMANDS)[number];

function isSimpleCommand(value: string): value is SimpleCommand {
    return SIMPLE_COMMANDS.some((command) => command === value);
}

export function parseReplCommand(line: string): ReplCommand {
    const trimmed = line.trim();
    if (!trimmed) return { kind: 'empty' };
    if (!trimmed.startsWith('/')) return { kind: 'message', text: trimmed };

    const name = trimmed.slice(1).split(/\s+/)[0]?.toLowerCase() ?? '';
    const rest = trimmed.slice(1 + name.length).trim();
    if (name === 'exit') return { kind: 'quit' };
    if (name === 'side') return { kind: 'side', text: rest };
    if (name === 'endside') return { kind: 'endside', merge: rest.toLowerCase() === 'merge' };
    if (isSimpleCommand(name)) return { kind: name };
    return { kind: 'unknown', name };
}

export function describeEvent(event: ControllerEvent): string | null {
    switch (event.type) {
        case 'summarization_started':
            return `(compressing earlier context: ${event.messageCount} messages)`;
        case 'summarization_completed':
            return `(context compressed; ${event.summarizedUpTo} messages summarized)`;
        case 'summarization_failed':
            return '(context compression failed; continuing with full history)';
        case 'retrieval_failed':
            return '(document search unavailable for this turn)';
        case 'persistence_failed':
            return '(could not save session)';
        case 'summarization_refused':
            return null;
    }
}

export function formatTocEntry(entry: TocEntry): string {
    const indent = entry.level === 2 ? '    ' : '';
    const marker = entry.kind === 'waypoint' ? '* ' : '- ';
    return `${indent}${marker}${entry.title} (message ${entry.messageIndex + 1})`;
}

export function formatTurnResult(result: TurnResult): string | null {
    switch (result.outcome) {
        case 'completed':
            return null;
        case 'interrupted':
            return '[interrupted]';
        case 'rolled_back':
            return '[interrupted before any reply; message withdrawn]';
        case 'failed':
            return `[error] ${result.error ?? 'unknown error'}`;
        case 'rejected':
            return `[skipped] ${result.error ?? ''}`.trim();
    }
}

export interface ReplOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

/**
 * Line-oriented front end over the controller. Ctrl+C while a reply streams
 * interrupts it; Ctrl+C at the prompt quits.
 */
export function startRepl(controller: ChatController, options: ReplOptions = {}): Promise<void> {
    const output = options.output ?? process.stdout;
    const rl = readline.createInterface({ input: options.input ?? process.stdin, output, terminal: true });
    const write = (text: string) => output.write(`${text}\n`);

    const unsubscribe = controller.onEvent((event) => {
        const line = describeEvent(event);
        if (line) write(line);
    });

    rl.on('SIGINT', () => {
        if (!controller.interrupt()) {
            rl.close();
        }
    });

    const handle = async (command: ReplCommand): Promise<boolean> => {
        switch (command.kind) {
            case 'empty':
                return true;
            case 'message':
            case 'regenerate': {
                const onChunk = (text: string) => output.write(text);
                const result = command.kind === 'message'
                    ? await controller.sendMessage(command.text, { onChunk })
                    : await controller.regenerate({ onChunk });
                output.write('\n');
                const note = formatTurnResult(result);
                if (note) write(note);
                return true;
            }
            case 'waypoint': {
                const waypoint = controller.placeWaypoint();
                write(waypoint ? `Waypoint set at message ${waypoint.messageIndex + 1}` : 'Nothing to mark yet.');
                return true;
            }
            case 'rollback': {
                const result = await controller.rollback();
                write(result.ok ? 'Last exchange removed.' : result.error);
                return true;
            }
            case 'status': {
                const status = controller.getStatus();
                write(
                    `${status.modelId} | ${status.currentTokens}/${status.windowSize} tokens ` +
                    `(${(status.percentage * 100).toFixed(1)}%, ${status.state}) | ` +
                    `${status.activeMessages} active, ${status.summarizedMessages} summarized | ` +
                    `mode: ${status.intentMode} | waypoints: ${status.waypointCount}`,
                );
                return true;
            }
            case 'new':
                await controller.newConversation();
                write('Started a new conversation.');
                return true;
            case 'fork': {
                const sessionId = await controller.fork();
                write(`Forked into session ${sessionId}.`);
                return true;
            }
            case 'save': {
                const result = await controller.saveSession();
                write(result.ok ? `Saved session ${controller.sessionId}.` : result.error);
                return true;
            }
            case 'artifacts': {
                const batch = await controller.generateArtifacts();
                const saved = await controller.saveArtifacts(batch);
                for (const target of saved) write(`Wrote ${target}`);
                for (const failure of batch.failures) write(`${failure.kind}: ${failure.error}`);
                return true;
            }
            case 'toc': {
                const entries = controller.getTableOfContents();
                if (entries.length === 0) write('No outline yet.');
                for (const entry of entries) write(formatTocEntry(entry));
                return true;
            }
            case 'export': {
                const target = await controller.exportMarkdown();
                write(`Wrote ${target}`);
                return true;
            }
            case 'side': {
                if (!controller.sideConversation) {
                    controller.startSideConversation();
                    write('(side conversation opened; /endside to close, /endside merge to fold it in)');
                }
                if (!command.text) return true;
                const result = await controller.askSide(command.text, { onChunk: (text) => output.write(text) });
                output.write('\n');
                const note = formatTurnResult(result);
                if (note) write(note);
                return true;
            }
            case 'endside': {
                if (!controller.sideConversation) {
                    write('No side conversation is open.');
                    return true;
                }
                const summary = controller.endSideConversation(command.merge);
                write(summary ? 'Side conversation merged into the main context.' : 'Side conversation closed.');
                return true;
            }
            case 'unknown':
                write(`Unknown command /${command.name}`);
                return true;
            case 'quit':
                return false;
        }
    };

    return new Promise((resolve) => {
        let queue: Promise<void> = Promise.resolve();

        rl.on('line', (line) => {
            queue = queue.then(async () => {
                try {
                    const keepGoing = await handle(parseReplCommand(line));
                    if (!keepGoing) {
                        rl.close();
                        return;
                    }
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    write(`[error] ${message}`);
                    void logThought(`[Repl] Command failed: ${message}`);
                }
                rl.prompt();
            });
        });

        rl.on('close', () => {
            unsubscribe();
            void queue.then(() => resolve(), () => resolve());
        });

        rl.setPrompt('> ');
        rl.prompt();
    });
}
