export type TextScalarType =
  | "string"
  | "int"
  | "int64"
  | "float"
  | "double"
  | "token"
  | "Content"
  | "UniqueId"
  | "SecurityCapabilities"
  | "Enum"
  | "BrickColor"
  | "Ref"
  | "SharedString";

export type Face = "Top" | "Bottom" | "Left" | "Right" | "Front" | "Back";

export const FACES: readonly Face[] = ["Top", "Bottom", "Left", "Right", "Front", "Back"];

export interface Vector3Components {
  x: string;
  y: string;
  z: string;
}

export interface TextScalarValue {
  type: TextScalarType;
  value: string;
}

export interface BoolValue {
  type: "bool";
  value: boolean;
}

export interface BinaryValue {
  type: "BinaryString" | "ProtectedString";
  value: string;
}

export interface Vector2Value {
  type: "Vector2";
  x: string;
  y: string;
}

export interface Vector3Value extends Vector3Components {
  type: "Vector3";
}

export interface Color3Value {
  type: "Color3" | "Color3uint8";
  r: string;
  g: string;
  b: string;
}

export interface CFrameValue {
  type: "CFrame" | "CoordinateFrame";
  components: string[];
}

export interface OptionalCFrameValue {
  type: "OptionalCoordinateFrame";
  components: string[] | null;
}

export interface UDimValue {
  type: "UDim";
  scale: string;
  offset: string;
}

export interface UDim2Value {
  type: "UDim2";
  xScale: string;
  xOffset: string;
  yScale: string;
  yOffset: string;
}

export interface NumberRangeValue {
  type: "NumberRange";
  min: string;
  max: string;
}

export interface Rect2DValue {
  type: "Rect2D";
  minX: string;
  minY: string;
  maxX: string;
  maxY: string;
}

export interface RayValue {
  type: "Ray";
  origin: Vector3Components;
  direction: Vector3Components;
}

export interface FontValue {
  type: "Font";
  family: string;
  weight: string;
  style: string;
}

export interface PhysicalPropertiesValue {
  type: "PhysicalProperties";
  density: string;
  friction: string;
  elasticity: string;
}

export interface FacesValue {
  type: "Faces" | "Axes";
  faces: Face[];
}

export interface NumberKeypoint {
  time: string;
  value: string;
  envelope: string;
}

export interface ColorKeypoint {
  time: string;
  r: string;
  g: string;
  b: string;
  envelope: string;
}

export interface NumberSequenceValue {
  type: "NumberSequence";
  keypoints: NumberKeypoint[];
}

export interface ColorSequenceValue {
  type: "ColorSequence";
  keypoints: ColorKeypoint[];
}

export type UnsupportedEntry =
  | { kind: "component"; tag: string; text: string }
  | { kind: "property"; name: string; value: PropertyValue };

// Catch-all for XML property tags without a template of their own.
export interface UnsupportedValue {
  type: "Unsupported";
  tag: string;
  text?: string;
  entries: UnsupportedEntry[];
}

export type PropertyValue =
  | TextScalarValue
  | BoolValue
  | BinaryValue
  | Vector2Value
  | Vector3Value
  | Color3Value
  | CFrameValue
  | OptionalCFrameValue
  | UDimValue
  | UDim2Value
  | NumberRangeValue
  | Rect2DValue
  | RayValue
  | FontValue
  | PhysicalPropertiesValue
  | FacesValue
  | NumberSequenceValue
  | ColorSequenceValue
  | UnsupportedValue;

export type PropertyType = PropertyValue["type"];

export interface InstanceNode {
  id?: string;
  name?: string;
  className: string;
  properties: Record<string, PropertyValue>;
  children: InstanceNode[];
}

export interface ParsedRbxlx {
  rootTag: string;
  rootAttributes: Record<string, string>;
  items: InstanceNode[];
}

export interface PathRecord {
  path: string;
  id: string;
  className: string;
  properties: string[];
}

export interface UnsupportedDiagnostic {
  path: string;
  property: string;
  tag: string;
}

export interface WalkResult {
  records: PathRecord[];
  diagnostics: UnsupportedDiagnostic[];
}

export interface FilterConfig {
  pathWhitelist: string[];
  pathBlacklist: string[];
  classWhitelist: string[];
  classBlacklist: string[];
  usePathWhitelist: boolean;
  usePathBlacklist: boolean;
  useClassWhitelist: boolean;
  useClassBlacklist: boolean;
  excludeNoIdItems: boolean;
  rootToken: string;
}

export interface RenderOptions {
  showClass: boolean;
  showProperties: boolean;
}

export interface ExportOptions extends RenderOptions {
  output: string;
  singleFile: boolean;
}

export interface ExportSummary {
  files: string[];
  recordCount: number;
  lineCount: number;
}
