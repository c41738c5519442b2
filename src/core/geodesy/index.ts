export * from "./coords";
export * from "./datum";
export * from "./ellipsoid";
export * from "./ellipsoidal";
export * from "./gridZone";
export * from "./helmert";
export * from "./mgrs";
export * from "./position";
export * from "./utm";
export * from "./vincenty";
