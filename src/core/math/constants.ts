export const DEG2RAD = Math.PI / 180;
export const RAD2DEG = 180 / Math.PI;
export const ARCSEC2RAD = DEG2RAD / 3600;

export const DOUBLE_EPSILON = Number.EPSILON;
