export const OPENAI_CLIENT = Symbol('OPENAI_CLIENT');
