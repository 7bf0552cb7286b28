export * from './game/audio';
export { CoroutineRunner, nextTick, waitSeconds } from './game/coroutine-runner';
export type { Routine, RoutineHandle, WaitInstruction } from './game/coroutine-runner';
export { EventBus, EventSubscriptionManager } from './game/event-bus';
export type { SfxEvents } from './game/event-bus';
export { FrameLoop } from './game/frame-loop';
export type { FrameLoopOptions } from './game/frame-loop';
export { SeededRng, createSfxRng, DEFAULT_SFX_SEED } from './game/rng';
export type { TickSystem } from './game/tick-system';
export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType } from './utilities/log-manager';
export type { ILogMessage } from './utilities/log-manager';
