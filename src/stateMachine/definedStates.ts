// src/stateMachine/definedStates.ts

export enum RenderStates {
    INIT = 'INIT',
    LOAD_SOURCE = 'LOAD_SOURCE',
    RENDER_ICONS = 'RENDER_ICONS',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
