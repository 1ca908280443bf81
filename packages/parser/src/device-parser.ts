import { DeviceIdentity } from './types.js';

const MODEL_RE = /Model: (.+)/;
const BRAND_RE = /Brand: (.+)/;
const ANDROID_VERSION_RE = /Android Version: (.+)/;

// getprop format: "[ro.product.model]: [CPH2451]"
const PROPERTY_RE = /\[(.+?)\]: \[(.+?)\]/g;

export function emptyDeviceIdentity(): DeviceIdentity {
  return { properties: {} };
}

/**
 * Parse device identity: the model/brand/version header lines plus every
 * `getprop` pair in the file. Property values are kept as text; a property
 * listed twice keeps its last value.
 */
export function parseDeviceInfo(content: string, into = emptyDeviceIdentity()): DeviceIdentity {
  if (!content) return into;

  const model = matchFirst(content, MODEL_RE);
  if (model) into.model = model;

  const brand = matchFirst(content, BRAND_RE);
  if (brand) into.brand = brand;

  const androidVersion = matchFirst(content, ANDROID_VERSION_RE);
  if (androidVersion) into.androidVersion = androidVersion;

  for (const [, prop, value] of content.matchAll(PROPERTY_RE)) {
    into.properties[`prop_${prop}`] = { kind: 'text', value };
  }

  return into;
}

function matchFirst(text: string, re: RegExp): string | null {
  const m = text.match(re);
  if (!m) return null;
  const value = m[1].trim();
  return value || null;
}
