export const runner = { setup: () => undefined };

export default 'runner';
