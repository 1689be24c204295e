export * from './identity.js';
export * from './perception.js';
export * from './cognition.js';
export * from './action.js';
export * from './state.js';
export * from './interaction.js';
export * from './oversight.js';
