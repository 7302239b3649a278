export const LIB_VERSION = '1.0.0';
