export const COMMONROOM_VERSION = '0.1.0';
