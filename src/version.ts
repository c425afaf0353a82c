export const APP_NAME = 'voice-turn-pipeline';
export const APP_VERSION = '0.1.0';
