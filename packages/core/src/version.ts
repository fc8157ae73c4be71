/** Package version, reported by `calx --version` */
export const VERSION = '0.1.0';
