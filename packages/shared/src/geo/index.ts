export {
  EARTH_RADIUS_M,
  distance3d,
  haversineDistance,
  offsetPoint,
  pathLength,
  pointInPolygon,
} from "./geodesy.js"
