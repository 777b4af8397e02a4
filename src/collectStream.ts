import { Transform, Writable } from 'stream';
import { pipeline } from 'stream/promises';

/**
 * Runs source through the stages and resolves with every object the last stage
 * pushed, e.g. the dialogue events of a script.
 */
export async function collectStream<T>(source: NodeJS.ReadableStream, ...stages: [Transform, ...Transform[]]): Promise<T[]> {
    const collected: T[] = [];

    const sink = new Writable({
        objectMode: true,
        write(obj: T, _encoding, cb) {
            collected.push(obj);
            cb();
        }
    });

    await pipeline([source, ...stages, sink]);
    return collected;
}
