import { FACES } from "./types";
import type {
  ColorKeypoint,
  Face,
  NumberKeypoint,
  PropertyType,
  PropertyValue,
  UnsupportedEntry,
  Vector3Components
} from "./types";

export interface EncodedProperty {
  lines: string[];
  unsupported: string[];
}

export interface DecodedProperty {
  name: string;
  value: PropertyValue;
}

export interface DecodeRule {
  type: PropertyType;
  accepts: (text: string) => boolean;
  build: (text: string) => PropertyValue;
}

const INT32_MAX = 2147483647n;
const NUM = "-?(?:\\d+(?:\\.\\d+)?|\\.\\d+)(?:[eE][-+]?\\d+)?";
const UNSUPPORTED_MARKER = /^(.*) \[UNSUPPORTED TYPE: ([^\]]+)\]$/;
const UNSUPPORTED_HEADER = /^- ([^:]+?) \[UNSUPPORTED TYPE: ([^\]]+)\]$/;
const COMPONENT_LINE = /^- ([A-Za-z_][\w.-]*): ?(.*)$/;

const ESCAPES: Record<string, string> = { "\\": "\\\\", "\n": "\\n", "\r": "\\r" };
const UNESCAPES: Record<string, string> = { "\\": "\\", n: "\n", r: "\r" };

// Keeps every value on one line: backslashes and line breaks are written as escapes.
export function escapeText(text: string): string {
  return text.replace(/[\\\n\r]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function unescapeText(text: string): string {
  return text.replace(/\\([\\nr])/g, (match, ch: string) => UNESCAPES[ch] ?? match);
}

function vector3Text(v: Vector3Components): string {
  return `(${v.x}, ${v.y}, ${v.z})`;
}

function numberKeypointText(k: NumberKeypoint): string {
  return `t:${k.time},v:${k.value},e:${k.envelope}`;
}

function colorKeypointText(k: ColorKeypoint): string {
  return `t:${k.time},rgb(${k.r},${k.g},${k.b}),e:${k.envelope}`;
}

export function encodeValue(value: PropertyValue): string {
  switch (value.type) {
    case "bool":
      return String(value.value);
    case "int":
    case "int64":
    case "SecurityCapabilities":
      return value.value || "0";
    case "float":
    case "double":
      return value.value || "0.0";
    case "string":
    case "token":
    case "Content":
    case "UniqueId":
      return escapeText(value.value);
    case "SharedString":
      return `SharedString(${value.value})`;
    case "Ref":
      return `Ref(${value.value})`;
    case "Enum":
      return `Enum(${value.value})`;
    case "BrickColor":
      return `BrickColor(${value.value})`;
    case "BinaryString":
    case "ProtectedString":
      return "[Binary Data]";
    case "Color3uint8":
      return `RGB(${value.r}, ${value.g}, ${value.b})`;
    case "Color3":
      return `Color3(${value.r}, ${value.g}, ${value.b})`;
    case "Vector3":
      return vector3Text(value);
    case "Vector2":
      return `(${value.x}, ${value.y})`;
    case "CFrame":
    case "CoordinateFrame":
      return `CFrame(${value.components.join(", ")})`;
    case "OptionalCoordinateFrame":
      return value.components ? `CFrame(${value.components.join(", ")})` : "nil";
    case "UDim":
      return `Scale: ${value.scale}, Offset: ${value.offset}`;
    case "UDim2":
      return `X(Scale: ${value.xScale}, Offset: ${value.xOffset}), Y(Scale: ${value.yScale}, Offset: ${value.yOffset})`;
    case "NumberRange":
      return `Range(${value.min} to ${value.max})`;
    case "Rect2D":
      return `Rect(${value.minX}, ${value.minY}, ${value.maxX}, ${value.maxY})`;
    case "Ray":
      return `Ray(Origin: ${vector3Text(value.origin)}, Direction: ${vector3Text(value.direction)})`;
    case "Font":
      return `Font(${value.family}, ${value.weight}, ${value.style})`;
    case "PhysicalProperties":
      return `PhysicalProperties(Density: ${value.density}, Friction: ${value.friction}, Elasticity: ${value.elasticity})`;
    case "Faces":
    case "Axes":
      return `[${value.faces.join(", ")}]`;
    case "NumberSequence":
      return `NumberSequence(${value.keypoints.map(numberKeypointText).join("; ")})`;
    case "ColorSequence":
      return `ColorSequence(${value.keypoints.map(colorKeypointText).join("; ")})`;
    case "Unsupported":
      return `${escapeText(value.text ?? "")} [UNSUPPORTED TYPE: ${value.tag}]`;
  }
}

export function encodeProperty(name: string, value: PropertyValue, indentLevel = 0): EncodedProperty {
  const indent = "  ".repeat(indentLevel);
  if (value.type !== "Unsupported") {
    return { lines: [`${indent}- ${name}: ${encodeValue(value)}`], unsupported: [] };
  }

  const unsupported = [value.tag];
  if (value.entries.length === 0 && value.text) {
    return { lines: [`${indent}- ${name}: ${encodeValue(value)}`], unsupported };
  }

  const lines = [`${indent}- ${name} [UNSUPPORTED TYPE: ${value.tag}]`];
  for (const entry of value.entries) {
    if (entry.kind === "component") {
      lines.push(`${indent}  - ${entry.tag}: ${escapeText(entry.text)}`);
      continue;
    }
    const nested = encodeProperty(entry.name, entry.value, indentLevel + 1);
    lines.push(...nested.lines);
    unsupported.push(...nested.unsupported);
  }
  return { lines, unsupported };
}

function groups(pattern: RegExp, text: string): string[] {
  const match = pattern.exec(text);
  return match ? match.slice(1).map((group) => group ?? "") : [];
}

function splitList(body: string, separator: string): string[] {
  return body.split(separator).map((part) => part.trim());
}

function unwrap(prefix: string): RegExp {
  return new RegExp(`^${prefix}\\((.*)\\)$`);
}

const RGB = new RegExp(`^RGB\\s*\\(\\s*(\\d+)\\s*,\\s*(\\d+)\\s*,\\s*(\\d+)\\s*\\)$`);
const VECTOR3 = new RegExp(`^\\(\\s*(${NUM})\\s*,\\s*(${NUM})\\s*,\\s*(${NUM})\\s*\\)$`);
const VECTOR2 = new RegExp(`^\\(\\s*(${NUM})\\s*,\\s*(${NUM})\\s*\\)$`);
const CFRAME = unwrap("CFrame");
const UDIM2 = new RegExp(
  `^X\\(Scale:\\s*(${NUM}),\\s*Offset:\\s*(${NUM})\\),\\s*Y\\(Scale:\\s*(${NUM}),\\s*Offset:\\s*(${NUM})\\)$`
);
const UDIM = new RegExp(`^Scale:\\s*(${NUM}),\\s*Offset:\\s*(${NUM})$`);
const SHARED_STRING = unwrap("SharedString");
const REF = unwrap("Ref");
const ENUM = unwrap("Enum");
const BRICK_COLOR = unwrap("BrickColor");
const COLOR3 = unwrap("Color3");
const RANGE = new RegExp(`^Range\\(\\s*(${NUM})\\s+to\\s+(${NUM})\\s*\\)$`);
const RECT = new RegExp(
  `^Rect\\(\\s*(${NUM})\\s*,\\s*(${NUM})\\s*,\\s*(${NUM})\\s*,\\s*(${NUM})\\s*\\)$`
);
const VEC3_BODY = `\\(\\s*(${NUM})\\s*,\\s*(${NUM})\\s*,\\s*(${NUM})\\s*\\)`;
const RAY = new RegExp(`^Ray\\(Origin:\\s*${VEC3_BODY},\\s*Direction:\\s*${VEC3_BODY}\\)$`);
const PHYSICAL = new RegExp(
  `^PhysicalProperties\\(Density:\\s*(${NUM}),\\s*Friction:\\s*(${NUM}),\\s*Elasticity:\\s*(${NUM})\\)$`
);
const FONT = unwrap("Font");
const NUMBER_SEQUENCE = unwrap("NumberSequence");
const COLOR_SEQUENCE = unwrap("ColorSequence");
const NUMBER_KEYPOINT = /^t:(.*),v:(.*),e:(.*)$/;
const COLOR_KEYPOINT = /^t:(.*),rgb\((.*),(.*),(.*)\),e:(.*)$/;
const FACE_NAME = FACES.join("|");
const FACE_LIST = new RegExp(`^\\[(?:(?:${FACE_NAME})(?:, (?:${FACE_NAME}))*)?\\]$`);

function keypointBodies(pattern: RegExp, text: string): string[] {
  const [body] = groups(pattern, text);
  return body.trim() ? body.split(";").map((part) => part.trim()) : [];
}

function isFace(value: string): value is Face {
  return FACES.some((face) => face === value);
}

function wrapped(
  type: "SharedString" | "Ref" | "Enum" | "BrickColor",
  pattern: RegExp
): DecodeRule {
  return {
    type,
    accepts: (text) => pattern.test(text),
    build: (text) => ({ type, value: groups(pattern, text)[0] })
  };
}

// Evaluated top to bottom; the first rule whose `accepts` holds decides the type.
export const DECODE_RULES: readonly DecodeRule[] = [
  {
    type: "Unsupported",
    accepts: (text) => UNSUPPORTED_MARKER.test(text),
    build: (text) => {
      const [body, tag] = groups(UNSUPPORTED_MARKER, text);
      return { type: "Unsupported", tag, text: unescapeText(body), entries: [] };
    }
  },
  {
    type: "bool",
    accepts: (text) => /^(true|false)$/i.test(text),
    build: (text) => ({ type: "bool", value: text.toLowerCase() === "true" })
  },
  {
    type: "int",
    accepts: (text) => /^-?\d+$/.test(text),
    build: (text) => {
      const magnitude = BigInt(text.replace("-", ""));
      return { type: magnitude > INT32_MAX ? "int64" : "int", value: text };
    }
  },
  {
    type: "float",
    accepts: (text) => /^-?\d+\.\d+$/.test(text),
    build: (text) => ({ type: "float", value: text })
  },
  {
    type: "Color3uint8",
    accepts: (text) => RGB.test(text),
    build: (text) => {
      const [r, g, b] = groups(RGB, text);
      return { type: "Color3uint8", r, g, b };
    }
  },
  {
    type: "Vector3",
    accepts: (text) => VECTOR3.test(text),
    build: (text) => {
      const [x, y, z] = groups(VECTOR3, text);
      return { type: "Vector3", x, y, z };
    }
  },
  {
    type: "Vector2",
    accepts: (text) => VECTOR2.test(text),
    build: (text) => {
      const [x, y] = groups(VECTOR2, text);
      return { type: "Vector2", x, y };
    }
  },
  {
    type: "CFrame",
    accepts: (text) => CFRAME.test(text) && splitList(groups(CFRAME, text)[0], ",").length === 12,
    build: (text) => ({ type: "CFrame", components: splitList(groups(CFRAME, text)[0], ",") })
  },
  {
    type: "UDim2",
    accepts: (text) => UDIM2.test(text),
    build: (text) => {
      const [xScale, xOffset, yScale, yOffset] = groups(UDIM2, text);
      return { type: "UDim2", xScale, xOffset, yScale, yOffset };
    }
  },
  {
    type: "UDim",
    accepts: (text) => UDIM.test(text),
    build: (text) => {
      const [scale, offset] = groups(UDIM, text);
      return { type: "UDim", scale, offset };
    }
  },
  {
    type: "BinaryString",
    accepts: (text) => text.includes("[Binary Data]"),
    build: () => ({ type: "BinaryString", value: "" })
  },
  wrapped("SharedString", SHARED_STRING),
  wrapped("Ref", REF),
  wrapped("Enum", ENUM),
  wrapped("BrickColor", BRICK_COLOR),
  {
    type: "Color3",
    accepts: (text) => COLOR3.test(text) && splitList(groups(COLOR3, text)[0], ",").length === 3,
    build: (text) => {
      const [r, g, b] = splitList(groups(COLOR3, text)[0], ",");
      return { type: "Color3", r, g, b };
    }
  },
  {
    type: "NumberRange",
    accepts: (text) => RANGE.test(text),
    build: (text) => {
      const [min, max] = groups(RANGE, text);
      return { type: "NumberRange", min, max };
    }
  },
  {
    type: "Rect2D",
    accepts: (text) => RECT.test(text),
    build: (text) => {
      const [minX, minY, maxX, maxY] = groups(RECT, text);
      return { type: "Rect2D", minX, minY, maxX, maxY };
    }
  },
  {
    type: "Ray",
    accepts: (text) => RAY.test(text),
    build: (text) => {
      const [ox, oy, oz, dx, dy, dz] = groups(RAY, text);
      return { type: "Ray", origin: { x: ox, y: oy, z: oz }, direction: { x: dx, y: dy, z: dz } };
    }
  },
  {
    type: "PhysicalProperties",
    accepts: (text) => PHYSICAL.test(text),
    build: (text) => {
      const [density, friction, elasticity] = groups(PHYSICAL, text);
      return { type: "PhysicalProperties", density, friction, elasticity };
    }
  },
  {
    type: "Font",
    accepts: (text) => FONT.test(text) && groups(FONT, text)[0].split(",").length === 3,
    build: (text) => {
      const [family, weight, style] = splitList(groups(FONT, text)[0], ",");
      return { type: "Font", family, weight, style };
    }
  },
  {
    type: "NumberSequence",
    accepts: (text) =>
      NUMBER_SEQUENCE.test(text) &&
      keypointBodies(NUMBER_SEQUENCE, text).every((body) => NUMBER_KEYPOINT.test(body)),
    build: (text) => ({
      type: "NumberSequence",
      keypoints: keypointBodies(NUMBER_SEQUENCE, text).map((body) => {
        const [time, value, envelope] = groups(NUMBER_KEYPOINT, body);
        return { time, value, envelope };
      })
    })
  },
  {
    type: "ColorSequence",
    accepts: (text) =>
      COLOR_SEQUENCE.test(text) &&
      keypointBodies(COLOR_SEQUENCE, text).every((body) => COLOR_KEYPOINT.test(body)),
    build: (text) => ({
      type: "ColorSequence",
      keypoints: keypointBodies(COLOR_SEQUENCE, text).map((body) => {
        const [time, r, g, b, envelope] = groups(COLOR_KEYPOINT, body);
        return { time, r, g, b, envelope };
      })
    })
  },
  {
    type: "Faces",
    accepts: (text) => FACE_LIST.test(text),
    build: (text) => ({
      type: "Faces",
      faces: text.slice(1, -1).split(", ").filter(isFace)
    })
  },
  {
    type: "string",
    accepts: () => true,
    build: (text) => ({ type: "string", value: unescapeText(text) })
  }
];

export function findDecodeRule(text: string): DecodeRule {
  const rule = DECODE_RULES.find((candidate) => candidate.accepts(text));
  return rule ?? DECODE_RULES[DECODE_RULES.length - 1];
}

export function decodeValue(text: string): PropertyValue {
  const trimmed = text.trim();
  return findDecodeRule(trimmed).build(trimmed);
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

// Lines indented deeper than the shallowest sub-line belong to the entry above them.
function groupEntryLines(subLines: string[]): string[][] {
  const lines = subLines.filter((line) => line.trim() !== "");
  if (lines.length === 0) {
    return [];
  }
  const base = Math.min(...lines.map(indentOf));
  const grouped: string[][] = [];
  for (const line of lines) {
    const current = grouped[grouped.length - 1];
    if (current && indentOf(line) > base) {
      current.push(line);
    } else {
      grouped.push([line]);
    }
  }
  return grouped;
}

function decodeEntries(subLines: string[]): UnsupportedEntry[] {
  const entries: UnsupportedEntry[] = [];
  for (const entryLines of groupEntryLines(subLines)) {
    const head = entryLines[0].trim();
    if (UNSUPPORTED_HEADER.test(head)) {
      const nested = decodeProperty(entryLines.join("\n"));
      if (nested) {
        entries.push({ kind: "property", name: nested.name, value: nested.value });
      }
      continue;
    }

    const match = COMPONENT_LINE.exec(head);
    if (!match) {
      continue;
    }
    const [, tag, text] = match;
    const value = decodeValue(text);
    if (value.type === "Unsupported") {
      entries.push({ kind: "property", name: tag, value });
    } else {
      entries.push({ kind: "component", tag, text: unescapeText(text.trim()) });
    }
  }
  return entries;
}

// Takes one property block: a `- Name: value` line plus any indented sub-lines.
export function decodeProperty(block: string): DecodedProperty | undefined {
  const [first = "", ...subLines] = block.split("\n");
  const head = first.trim();
  if (!head.startsWith("- ")) {
    return undefined;
  }

  const header = UNSUPPORTED_HEADER.exec(head);
  if (header) {
    return {
      name: header[1].trim(),
      value: { type: "Unsupported", tag: header[2], entries: decodeEntries(subLines) }
    };
  }

  const body = head.slice(2);
  const colon = body.indexOf(":");
  if (colon === -1) {
    return undefined;
  }
  return {
    name: body.slice(0, colon).trim(),
    value: decodeValue(body.slice(colon + 1))
  };
}
