export interface SseEvent {
    event: string | null;
    data: string;
}

function parseEvent(raw: string): SseEvent | null {
    let event: string | null = null;
    const data: string[] = [];
    for (const line of raw.split('\n')) {
        if (line.startsWith(':')) continue;
        if (line.startsWith('event:')) {
            event = line.slice(6).trim();
        } else if (line.startsWith('data:')) {
            data.push(line.slice(5).replace(/^ /, ''));
        }
    }
    if (data.length === 0 && event === null) return null;
    return { event, data: data.join('\n') };
}

/**
 * Splits a server-sent-events body into events. Events are separated by a
 * blank line; a trailing event without one is still delivered.
 */
export async function* readSseEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<SseEvent> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    // a CR ending one read may pair with an LF starting the next
    let heldCr = '';

    try {
        while (true) {
            const { value, done } = await reader.read();
            if (done) break;
            let text = heldCr + decoder.decode(value, { stream: true });
            heldCr = '';
            if (text.endsWith('\r')) {
                heldCr = '\r';
                text = text.slice(0, -1);
            }
            buffer += text.replace(/\r\n/g, '\n');

            let separator: number;
            while ((separator = buffer.indexOf('\n\n')) !== -1) {
                const rawEvent = buffer.slice(0, separator).trim();
                buffer = buffer.slice(separator + 2);
                const parsed = rawEvent ? parseEvent(rawEvent) : null;
                if (parsed) yield parsed;
            }
        }

        buffer += (heldCr + decoder.decode()).replace(/\r\n/g, '\n');
        const tail = buffer.trim();
        const parsed = tail ? parseEvent(tail) : null;
        if (parsed) yield parsed;
    } finally {
        reader.releaseLock();
    }
}
