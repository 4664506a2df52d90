import { AccessKernel } from '../Kernel.js';
import { InitializationGuard } from '../L0/Initialization.js';
import { MemoryStateStore } from '../L2/State.js';
import type { IStateStore } from '../L2/State.js';
import type { Principal } from '../L0/Ontology.js';
import { ManualClock } from '../../Platform/Ports.js';
import { silentLogger } from '../../logging.js';

export const ALICE: Principal = `0x${'a'.repeat(40)}`;
export const BOB: Principal = `0x${'b'.repeat(40)}`;
export const CAROL: Principal = `0x${'c'.repeat(40)}`;

export const START_TIME = 1_000;

export function makeKernel(store: IStateStore = new MemoryStateStore(), clock = new ManualClock(START_TIME)) {
    const kernel = new AccessKernel('test-object', { store, clock, logger: silentLogger() });
    const initialization = new InitializationGuard(kernel);
    return { kernel, initialization, store, clock };
}
