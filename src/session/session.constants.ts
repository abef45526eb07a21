export const SESSION_ID_HEADER = 'x-session-id';

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

export const VIDEO_FIELD_NAME = 'video';
