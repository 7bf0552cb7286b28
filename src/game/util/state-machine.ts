/**
 * Lightweight declarative state machine utility.
 *
 * Usage:
 *   const definition = defineStateMachine<MyContext>()<'start' | 'stop'>()({
 *       idle: {
 *           transitions: { start: 'running' },
 *       },
 *       running: {
 *           transitions: { stop: 'idle' },
 *           onEnter: (ctx) => ctx.startedAt = ctx.clock(),
 *           onExit: (ctx) => ctx.runs++,
 *       },
 *   });
 *
 *   const sm = definition.create('idle', context);
 *   sm.send('start');
 */

/** State configuration */
export interface StateConfig<TState extends string, TEvent extends string, TContext> {
    /** Valid transitions: { eventName: targetState } */
    transitions?: Partial<Record<TEvent, TState>>;
    /** Called when entering this state */
    onEnter?: (ctx: TContext) => void;
    /** Called when exiting this state */
    onExit?: (ctx: TContext) => void;
}

/** State machine definition (reusable template) */
export interface StateMachineDefinition<TState extends string, TEvent extends string, TContext> {
    /** Create a new state machine instance */
    create(initialState: TState, context: TContext): StateMachine<TState, TEvent, TContext>;
    /** Get all defined states */
    states: readonly TState[];
}

/** State machine instance */
export interface StateMachine<TState extends string, TEvent extends string, TContext> {
    /** Current state */
    readonly state: TState;
    /** Context object (mutable) */
    readonly context: TContext;
    /** Check if an event can be sent from current state */
    can(event: TEvent): boolean;
    /** Send an event to trigger a transition. Returns true if transition occurred. */
    send(event: TEvent): boolean;
}

/**
 * Define a state machine. Curried twice so the context and event types can be
 * given explicitly while the state names are inferred from the config:
 *   defineStateMachine<MyContext>()<MyEvent>()({ ... })
 */
export function defineStateMachine<TContext>() {
    return function <TEvent extends string>() {
        return function <TState extends string>(
            config: Record<TState, StateConfig<TState, TEvent, TContext>>
        ): StateMachineDefinition<TState, TEvent, TContext> {
            const states = Object.keys(config).filter(
                (key): key is TState => key in config
            );

            return {
                states,
                create(initialState: TState, context: TContext): StateMachine<TState, TEvent, TContext> {
                    let currentState = initialState;

                    config[currentState].onEnter?.(context);

                    const transitionTo = (newState: TState): boolean => {
                        if (newState === currentState) return false;

                        config[currentState].onExit?.(context);
                        currentState = newState;
                        config[currentState].onEnter?.(context);

                        return true;
                    };

                    return {
                        get state() {
                            return currentState;
                        },

                        get context() {
                            return context;
                        },

                        can(event: TEvent): boolean {
                            return config[currentState].transitions?.[event] !== undefined;
                        },

                        send(event: TEvent): boolean {
                            const target = config[currentState].transitions?.[event];
                            if (target === undefined) return false;

                            return transitionTo(target);
                        },
                    };
                },
            };
        };
    };
}
