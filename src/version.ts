export const NAME = 'fleettop';
export const VERSION = '1.0.0';
