/**
 * Geometry Types
 *
 * Reference data of a media object, discriminated on `type`.
 */

export type Point2DTuple = [x: number, y: number];
export type Point3DTuple = [x: number, y: number, z: number];
export type QuaternionTuple = [x: number, y: number, z: number, w: number];

/**
 * 2D bounding box given by its center point and total width/height.
 */
export interface BBox2DCenterPoint {
  type: 'bbox2d_center_point';
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point2DXY {
  type: 'point2d_xy';
  x: number;
  y: number;
}

/**
 * Polyline as a flat `[x0, y0, x1, y1, ...]` list.
 */
export interface PolyLine2DFlatCoordinates {
  type: 'polyline_2d_flat_coordinates';
  coordinates: number[];
  closed: boolean;
}

/**
 * 3D cuboid given by center position, heading quaternion and dimensions.
 */
export interface CuboidCenterPoint {
  type: 'cuboid_center_point';
  position: Point3DTuple;
  heading: QuaternionTuple;
  dimensions: Point3DTuple;
}

export interface Point3DXYZ {
  type: 'point3d_xyz';
  x: number;
  y: number;
  z: number;
}

export type Geometry =
  | BBox2DCenterPoint
  | Point2DXY
  | PolyLine2DFlatCoordinates
  | CuboidCenterPoint
  | Point3DXYZ;

export type GeometryType = Geometry['type'];
