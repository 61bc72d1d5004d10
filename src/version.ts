export const APP_NAME = "deskgrab";
export const APP_VERSION = "1.0.0";
