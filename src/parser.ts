import fs from "node:fs/promises";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { FACES } from "./types";
import type {
  ColorKeypoint,
  Face,
  InstanceNode,
  NumberKeypoint,
  ParsedRbxlx,
  PropertyValue,
  UnsupportedEntry,
  Vector3Components
} from "./types";

const TEXT_NODE = "#text";
const NAME_ATTRIBUTE = "@_name";

// Studio's 12-component CFrame layout; V0..V11 / R0..R11 are accepted as well.
export const CFRAME_TAGS = ["X", "Y", "Z", "R00", "R01", "R02", "R10", "R11", "R12", "R20", "R21", "R22"];

// Bit order of the Studio `faces` mask (NormalId order).
export const FACE_BITS: Record<Face, number> = {
  Right: 1,
  Top: 2,
  Back: 4,
  Left: 8,
  Bottom: 16,
  Front: 32
};

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: TEXT_NODE,
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false
});

export class RbxlxParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = "RbxlxParseError";
  }
}

type XmlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is XmlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeToArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === "") {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (isRecord(value)) {
    const text = value[TEXT_NODE];
    if (text !== undefined) {
      return textOf(text);
    }
    // Font families and content ids nest their text in a <url> element.
    if ("url" in value) {
      return textOf(value.url);
    }
  }
  return undefined;
}

function childOf(element: unknown, tag: string): unknown {
  if (!isRecord(element)) {
    return undefined;
  }
  const [first] = normalizeToArray(element[tag]);
  return first;
}

function component(element: unknown, tags: string[], fallback: string): string {
  for (const tag of tags) {
    const text = textOf(childOf(element, tag));
    if (text) {
      return text;
    }
  }
  return fallback;
}

function childTags(element: unknown): string[] {
  if (!isRecord(element)) {
    return [];
  }
  return Object.keys(element).filter((key) => !key.startsWith("@_") && key !== TEXT_NODE);
}

function words(element: unknown): string[] {
  return (textOf(element) ?? "").split(/\s+/).filter((word) => word.length > 0);
}

function readVector3(element: unknown): Vector3Components {
  return {
    x: component(element, ["X"], "0"),
    y: component(element, ["Y"], "0"),
    z: component(element, ["Z"], "0")
  };
}

function readCFrameComponents(element: unknown): string[] {
  return CFRAME_TAGS.map((tag, index) => component(element, [tag, `V${index}`, `R${index}`], "0"));
}

function readColor3uint8(element: unknown): PropertyValue {
  if (childTags(element).length === 0) {
    const packed = Number(textOf(element) ?? "0");
    if (Number.isFinite(packed)) {
      return {
        type: "Color3uint8",
        r: String(Math.floor(packed / 65536) % 256),
        g: String(Math.floor(packed / 256) % 256),
        b: String(packed % 256)
      };
    }
  }
  return {
    type: "Color3uint8",
    r: component(element, ["R"], "0"),
    g: component(element, ["G"], "0"),
    b: component(element, ["B"], "0")
  };
}

function readFaces(type: "Faces" | "Axes", element: unknown): PropertyValue {
  const mask = textOf(childOf(element, "faces"));
  if (type === "Faces" && mask !== undefined) {
    const bits = Number(mask);
    return { type, faces: FACES.filter((face) => (bits & FACE_BITS[face]) !== 0) };
  }
  return {
    type,
    faces: FACES.filter((face) => component(element, [face], "false").toLowerCase() === "true")
  };
}

function readNumberSequence(element: unknown): PropertyValue {
  const keypointElements = isRecord(element) ? normalizeToArray(element.Keypoint) : [];
  if (keypointElements.length > 0) {
    return {
      type: "NumberSequence",
      keypoints: keypointElements.map((keypoint): NumberKeypoint => ({
        time: component(keypoint, ["Time"], "0"),
        value: component(keypoint, ["Value"], "0"),
        envelope: component(keypoint, ["Envelope"], "0")
      }))
    };
  }
  const values = words(element);
  const keypoints: NumberKeypoint[] = [];
  for (let index = 0; index + 2 < values.length; index += 3) {
    keypoints.push({ time: values[index], value: values[index + 1], envelope: values[index + 2] });
  }
  return { type: "NumberSequence", keypoints };
}

function readColorSequence(element: unknown): PropertyValue {
  const keypointElements = isRecord(element) ? normalizeToArray(element.Keypoint) : [];
  if (keypointElements.length > 0) {
    return {
      type: "ColorSequence",
      keypoints: keypointElements.map((keypoint): ColorKeypoint => {
        const color = childOf(keypoint, "Value");
        return {
          time: component(keypoint, ["Time"], "0"),
          r: component(color, ["R"], "0"),
          g: component(color, ["G"], "0"),
          b: component(color, ["B"], "0"),
          envelope: component(keypoint, ["Envelope"], "0")
        };
      })
    };
  }
  const values = words(element);
  const keypoints: ColorKeypoint[] = [];
  for (let index = 0; index + 4 < values.length; index += 5) {
    keypoints.push({
      time: values[index],
      r: values[index + 1],
      g: values[index + 2],
      b: values[index + 3],
      envelope: values[index + 4]
    });
  }
  return { type: "ColorSequence", keypoints };
}

function readNumberRange(element: unknown): PropertyValue {
  if (childTags(element).length === 0) {
    const [min = "0", max = "0"] = words(element);
    return { type: "NumberRange", min, max };
  }
  return {
    type: "NumberRange",
    min: component(element, ["Min"], "0"),
    max: component(element, ["Max"], "0")
  };
}

function readRect2D(element: unknown): PropertyValue {
  const min = childOf(element, "min");
  const max = childOf(element, "max");
  if (min !== undefined || max !== undefined) {
    return {
      type: "Rect2D",
      minX: component(min, ["X"], "0"),
      minY: component(min, ["Y"], "0"),
      maxX: component(max, ["X"], "0"),
      maxY: component(max, ["Y"], "0")
    };
  }
  return {
    type: "Rect2D",
    minX: component(element, ["min_x"], "0"),
    minY: component(element, ["min_y"], "0"),
    maxX: component(element, ["max_x"], "0"),
    maxY: component(element, ["max_y"], "0")
  };
}

function readUnsupported(tag: string, element: unknown): PropertyValue {
  const tags = childTags(element);
  if (tags.length === 0) {
    return { type: "Unsupported", tag, text: textOf(element) ?? "", entries: [] };
  }
  const entries: UnsupportedEntry[] = [];
  for (const childTag of tags) {
    const children = isRecord(element) ? normalizeToArray(element[childTag]) : [];
    for (const child of children) {
      const name = isRecord(child) ? child[NAME_ATTRIBUTE] : undefined;
      if (typeof name === "string") {
        entries.push({ kind: "property", name, value: readPropertyValue(childTag, child) });
      } else {
        entries.push({ kind: "component", tag: childTag, text: textOf(child) ?? "" });
      }
    }
  }
  return { type: "Unsupported", tag, entries };
}

export function readPropertyValue(tag: string, element: unknown): PropertyValue {
  const text = textOf(element) ?? "";
  switch (tag) {
    case "string":
    case "token":
    case "Content":
    case "UniqueId":
    case "Enum":
    case "BrickColor":
    case "SharedString":
      return { type: tag, value: text };
    case "int":
    case "int64":
    case "SecurityCapabilities":
    case "float":
    case "double":
      return { type: tag, value: text };
    case "Ref":
    case "Reference":
      return { type: "Ref", value: text };
    case "bool":
      return { type: "bool", value: text.toLowerCase() === "true" };
    case "BinaryString":
    case "ProtectedString":
      return { type: tag, value: text };
    case "Color3uint8":
      return readColor3uint8(element);
    case "Color3":
      return {
        type: "Color3",
        r: component(element, ["R"], "0"),
        g: component(element, ["G"], "0"),
        b: component(element, ["B"], "0")
      };
    case "Vector3":
      return { type: "Vector3", ...readVector3(element) };
    case "Vector2":
      return { type: "Vector2", x: component(element, ["X"], "0"), y: component(element, ["Y"], "0") };
    case "CFrame":
    case "CoordinateFrame":
      return { type: tag, components: readCFrameComponents(element) };
    case "OptionalCoordinateFrame": {
      if (childTags(element).length === 0) {
        return { type: "OptionalCoordinateFrame", components: null };
      }
      const inner = childOf(element, "CFrame");
      return { type: "OptionalCoordinateFrame", components: readCFrameComponents(inner ?? element) };
    }
    case "UDim":
      return { type: "UDim", scale: component(element, ["S"], "0"), offset: component(element, ["O"], "0") };
    case "UDim2":
      return {
        type: "UDim2",
        xScale: component(element, ["XS"], "0"),
        xOffset: component(element, ["XO"], "0"),
        yScale: component(element, ["YS"], "0"),
        yOffset: component(element, ["YO"], "0")
      };
    case "NumberRange":
      return readNumberRange(element);
    case "Rect2D":
      return readRect2D(element);
    case "Ray":
      return {
        type: "Ray",
        origin: readVector3(childOf(element, "origin") ?? childOf(element, "Origin")),
        direction: readVector3(childOf(element, "direction") ?? childOf(element, "Direction"))
      };
    case "Font":
      return {
        type: "Font",
        family: component(element, ["Family"], ""),
        weight: component(element, ["Weight"], ""),
        style: component(element, ["Style"], "")
      };
    case "PhysicalProperties":
      return {
        type: "PhysicalProperties",
        density: component(element, ["Density"], "0"),
        friction: component(element, ["Friction"], "0"),
        elasticity: component(element, ["Elasticity"], "0")
      };
    case "Faces":
    case "Axes":
      return readFaces(tag, element);
    case "NumberSequence":
      return readNumberSequence(element);
    case "ColorSequence":
      return readColorSequence(element);
    default:
      return readUnsupported(tag, element);
  }
}

function buildNode(item: XmlRecord): InstanceNode {
  const className = String(item["@_class"] ?? "Folder");
  const node: InstanceNode = {
    className,
    properties: {},
    children: []
  };

  const properties = isRecord(item.Properties) ? item.Properties : {};
  for (const typeName of childTags(properties)) {
    for (const entry of normalizeToArray(properties[typeName])) {
      const propertyName = isRecord(entry) ? entry[NAME_ATTRIBUTE] : undefined;
      if (typeof propertyName !== "string" || !propertyName) {
        continue;
      }
      const value = readPropertyValue(typeName, entry);
      if (propertyName === "Name" && value.type === "string") {
        node.name = value.value;
      } else if (propertyName === "UniqueId" && value.type === "UniqueId") {
        node.id = value.value;
      } else {
        node.properties[propertyName] = value;
      }
    }
  }

  node.children = normalizeToArray(item.Item).filter(isRecord).map((child) => buildNode(child));
  return node;
}

export function parseRbxlxText(xml: string): ParsedRbxlx {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new RbxlxParseError(validation.err.msg, validation.err.line);
  }

  const parsed: unknown = parser.parse(xml);
  const rootTag = isRecord(parsed) ? Object.keys(parsed)[0] : undefined;
  if (!isRecord(parsed) || !rootTag) {
    throw new RbxlxParseError("Document has no root element");
  }

  const rootValue = parsed[rootTag];
  const rootObject = isRecord(rootValue) ? rootValue : {};
  const rootAttributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(rootObject)) {
    if (key.startsWith("@_")) {
      rootAttributes[key.slice(2)] = String(value);
    }
  }

  return {
    rootTag,
    rootAttributes,
    items: normalizeToArray(rootObject.Item).filter(isRecord).map((item) => buildNode(item))
  };
}

export async function parseRbxlx(filePath: string): Promise<ParsedRbxlx> {
  const xml = await fs.readFile(filePath, "utf8");
  return parseRbxlxText(xml);
}
