export const EARTH_RADIUS_M = 6371000;

/**
 * Converts degrees to radians.
 */
export const toRad = (deg: number) => (deg * Math.PI) / 180;

const toDeg = (rad: number) => (rad * 180) / Math.PI;

/**
 * Great-circle distance in meters (haversine, fixed Earth radius).
 * Every distance in the pipeline goes through this function.
 */
export const haversineDistance = (lat1: number, lon1: number, lat2: number, lon2: number): number => {
    const dLat = toRad(lat2 - lat1);
    const dLon = toRad(lon2 - lon1);
    const a =
        Math.sin(dLat / 2) * Math.sin(dLat / 2) +
        Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) *
        Math.sin(dLon / 2) * Math.sin(dLon / 2);
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
    return EARTH_RADIUS_M * c;
};

/**
 * Initial bearing from the first position to the second, in degrees [0, 360).
 */
export const initialBearing = (lat1: number, lon1: number, lat2: number, lon2: number): number => {
    const phi1 = toRad(lat1);
    const phi2 = toRad(lat2);
    const dLon = toRad(lon2 - lon1);
    const y = Math.sin(dLon) * Math.cos(phi2);
    const x = Math.cos(phi1) * Math.sin(phi2) - Math.sin(phi1) * Math.cos(phi2) * Math.cos(dLon);
    return (toDeg(Math.atan2(y, x)) + 360) % 360;
};

/**
 * Smallest absolute angle between two bearings, in degrees [0, 180].
 */
export const bearingDelta = (from: number, to: number): number => {
    const diff = Math.abs(to - from) % 360;
    return diff > 180 ? 360 - diff : diff;
};

export const isWithinRadius = (
    lat: number,
    lon: number,
    center: { lat: number; lon: number },
    radiusM: number
): boolean => {
    return haversineDistance(lat, lon, center.lat, center.lon) <= radiusM;
};
