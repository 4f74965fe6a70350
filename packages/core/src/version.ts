/**
 * Package version, reported by TetherServer.VERSION
 */
export const VERSION = '0.1.0';
