export const LOGGER = 'Logger';
export const CLOCK = 'Clock';
export const RANDOM_SOURCE = 'RandomSource';
