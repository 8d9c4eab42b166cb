/**
 * rackctl release; also the image tag a local rack starts with
 */
export const VERSION = '0.1.0';
