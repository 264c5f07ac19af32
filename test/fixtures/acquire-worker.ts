// Attaches to a shared bucket, waits on the start gate, then calls acquire(1)
// `attempts` times and reports how many were admitted.
import { parentPort, workerData } from 'node:worker_threads';
import { SharedTokenBucket } from '../../src/bucket/shared-token-bucket.js';

export interface AcquireWorkerData {
  bucket: SharedArrayBuffer;
  gate: SharedArrayBuffer;
  attempts: number;
}

export type AcquireWorkerMessage = { type: 'ready' } | { type: 'done'; admitted: number };

const { bucket: buffer, gate, attempts }: AcquireWorkerData = workerData;

const bucket = SharedTokenBucket.attach(buffer, { name: 'contended' });
const start = new Int32Array(gate);

function post(message: AcquireWorkerMessage): void {
  parentPort?.postMessage(message);
}

post({ type: 'ready' });
Atomics.wait(start, 0, 0);

let admitted = 0;
for (let i = 0; i < attempts; i++) {
  if (bucket.acquire(1).admitted) admitted++;
}
post({ type: 'done', admitted });
