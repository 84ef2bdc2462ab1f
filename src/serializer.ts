import { XMLBuilder } from "fast-xml-parser";
import { CFRAME_TAGS, FACE_BITS } from "./parser";
import { FACES } from "./types";
import type { InstanceNode, PropertyValue, UnsupportedEntry, Vector3Components } from "./types";

export const ROOT_ATTRIBUTES: Record<string, string> = {
  "xmlns:xmime": "http://www.w3.org/2005/05/xmlmime",
  "xmlns:xsi": "http://www.w3.org/2001/XMLSchema-instance",
  "xsi:noNamespaceSchemaLocation": "http://www.roblox.com/roblox.xsd",
  version: "4"
};

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  format: true
});

const RESERVED_PROPERTIES = new Set(["Name", "UniqueId"]);

type XmlObject = Record<string, unknown>;

export interface XmlProperty {
  tag: string;
  body: XmlObject;
}

function vector3Body(v: Vector3Components): XmlObject {
  return { X: v.x, Y: v.y, Z: v.z };
}

function cframeBody(components: string[]): XmlObject {
  const body: XmlObject = {};
  CFRAME_TAGS.forEach((tag, index) => {
    body[tag] = components[index] ?? "0";
  });
  return body;
}

function packColor3uint8(r: string, g: string, b: string): string {
  const channel = (value: string): number => Math.min(255, Math.max(0, Math.round(Number(value) || 0)));
  return String(0xff000000 + channel(r) * 65536 + channel(g) * 256 + channel(b));
}

function appendChild(body: XmlObject, tag: string, child: unknown): void {
  const existing = body[tag];
  if (existing === undefined) {
    body[tag] = child;
  } else if (Array.isArray(existing)) {
    existing.push(child);
  } else {
    body[tag] = [existing, child];
  }
}

function unsupportedBody(text: string | undefined, entries: UnsupportedEntry[]): XmlObject {
  if (entries.length === 0) {
    return { "#text": text ?? "" };
  }
  const body: XmlObject = {};
  for (const entry of entries) {
    if (entry.kind === "component") {
      appendChild(body, entry.tag, entry.text);
    } else {
      const nested = toXmlProperty(entry.name, entry.value);
      appendChild(body, nested.tag, nested.body);
    }
  }
  return body;
}

function valueBody(value: PropertyValue): { tag: string; body: XmlObject } {
  switch (value.type) {
    case "bool":
      return { tag: "bool", body: { "#text": String(value.value) } };
    case "string":
    case "int":
    case "int64":
    case "float":
    case "double":
    case "token":
    case "Content":
    case "UniqueId":
    case "SecurityCapabilities":
    case "Enum":
    case "BrickColor":
    case "Ref":
    case "SharedString":
    case "BinaryString":
    case "ProtectedString":
      return { tag: value.type, body: { "#text": value.value } };
    case "Color3uint8":
      return { tag: "Color3uint8", body: { "#text": packColor3uint8(value.r, value.g, value.b) } };
    case "Color3":
      return { tag: "Color3", body: { R: value.r, G: value.g, B: value.b } };
    case "Vector3":
      return { tag: "Vector3", body: vector3Body(value) };
    case "Vector2":
      return { tag: "Vector2", body: { X: value.x, Y: value.y } };
    case "CFrame":
    case "CoordinateFrame":
      return { tag: value.type, body: cframeBody(value.components) };
    case "OptionalCoordinateFrame":
      return {
        tag: "OptionalCoordinateFrame",
        body: value.components ? { CFrame: cframeBody(value.components) } : {}
      };
    case "UDim":
      return { tag: "UDim", body: { S: value.scale, O: value.offset } };
    case "UDim2":
      return {
        tag: "UDim2",
        body: { XS: value.xScale, XO: value.xOffset, YS: value.yScale, YO: value.yOffset }
      };
    case "NumberRange":
      return { tag: "NumberRange", body: { "#text": `${value.min} ${value.max} ` } };
    case "Rect2D":
      return {
        tag: "Rect2D",
        body: { min: { X: value.minX, Y: value.minY }, max: { X: value.maxX, Y: value.maxY } }
      };
    case "Ray":
      return {
        tag: "Ray",
        body: { origin: vector3Body(value.origin), direction: vector3Body(value.direction) }
      };
    case "Font":
      return {
        tag: "Font",
        body: { Family: { url: value.family }, Weight: value.weight, Style: value.style }
      };
    case "PhysicalProperties":
      return {
        tag: "PhysicalProperties",
        body: {
          CustomPhysics: "true",
          Density: value.density,
          Friction: value.friction,
          Elasticity: value.elasticity
        }
      };
    case "Faces":
      return {
        tag: "Faces",
        body: { faces: String(value.faces.reduce((mask, face) => mask | FACE_BITS[face], 0)) }
      };
    case "Axes": {
      const body: XmlObject = {};
      for (const face of FACES) {
        body[face] = String(value.faces.includes(face));
      }
      return { tag: "Axes", body };
    }
    case "NumberSequence":
      return {
        tag: "NumberSequence",
        body: { "#text": value.keypoints.map((k) => `${k.time} ${k.value} ${k.envelope} `).join("") }
      };
    case "ColorSequence":
      return {
        tag: "ColorSequence",
        body: {
          "#text": value.keypoints.map((k) => `${k.time} ${k.r} ${k.g} ${k.b} ${k.envelope} `).join("")
        }
      };
    case "Unsupported":
      return { tag: value.tag, body: unsupportedBody(value.text, value.entries) };
  }
}

export function toXmlProperty(name: string, value: PropertyValue): XmlProperty {
  const { tag, body } = valueBody(value);
  return { tag, body: { "@_name": name, ...body } };
}

function itemRecord(node: InstanceNode): XmlObject {
  const properties: XmlObject = {};
  const name = toXmlProperty("Name", { type: "string", value: node.name ?? "" });
  appendChild(properties, name.tag, name.body);
  if (node.id) {
    const uniqueId = toXmlProperty("UniqueId", { type: "UniqueId", value: node.id });
    appendChild(properties, uniqueId.tag, uniqueId.body);
  }
  for (const [propertyName, value] of Object.entries(node.properties)) {
    if (RESERVED_PROPERTIES.has(propertyName)) {
      continue;
    }
    const property = toXmlProperty(propertyName, value);
    appendChild(properties, property.tag, property.body);
  }

  const item: XmlObject = {
    "@_class": node.className,
    Properties: properties
  };
  if (node.id) {
    item["@_referent"] = node.id;
  }
  if (node.children.length > 0) {
    item.Item = node.children.map(itemRecord);
  }
  return item;
}

export function serializeRbxlx(items: InstanceNode[], rootAttributes: Record<string, string> = ROOT_ATTRIBUTES): string {
  const root: XmlObject = {};
  for (const [key, value] of Object.entries(rootAttributes)) {
    root[`@_${key}`] = value;
  }
  if (items.length > 0) {
    root.Item = items.map(itemRecord);
  }
  return builder.build({ roblox: root });
}
