// src/service.ts

import { z } from "zod";
import { AddrPort, formatAddrPort, parseAddrPort } from "./address";

export type Labels = Readonly<Record<string, string>>;

/**
 * A discoverable network endpoint.
 */
export interface Service {
  readonly name: string;
  readonly labels: Labels;
  readonly addrPort: AddrPort;
}

/**
 * JSON form of a service as exchanged between registries.
 */
export interface WireService {
  name: string;
  labels: Record<string, string>;
  addrPort: string;
}

export const AddrPortSchema = z.string().transform((value, ctx) => {
  const parsed = parseAddrPort(value);
  if (!parsed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid IPv4 address and port: ${value}`,
    });
    return z.NEVER;
  }
  return parsed;
});

export const LabelsSchema = z
  .record(z.string())
  .nullish()
  .transform((labels) => labels ?? {});

export const ServiceSchema = z.object({
  name: z.string(),
  labels: LabelsSchema,
  addrPort: AddrPortSchema,
});

export const ServiceListSchema = z.array(ServiceSchema);

export const AddDelegateRequestSchema = z.object({
  addrPort: AddrPortSchema,
});

/**
 * Builds a frozen service record, copying the labels so later changes to the
 * caller's object cannot leak into the directory.
 */
export function createService(
  name: string,
  addrPort: AddrPort,
  labels?: Record<string, string> | null,
): Service {
  return Object.freeze({
    name,
    labels: Object.freeze({ ...(labels ?? {}) }),
    addrPort: Object.freeze({ address: addrPort.address, port: addrPort.port }),
  });
}

export function toWireService(service: Service): WireService {
  return {
    name: service.name,
    labels: { ...service.labels },
    addrPort: formatAddrPort(service.addrPort),
  };
}

/**
 * Reports whether a service has the given name and carries every label of the
 * filter with an equal value. Labels the filter does not mention are ignored.
 */
export function serviceMatches(
  service: Service,
  name: string,
  labelFilter: Labels = {},
): boolean {
  if (service.name !== name) {
    return false;
  }
  for (const [key, value] of Object.entries(labelFilter)) {
    if (!Object.prototype.hasOwnProperty.call(service.labels, key)) {
      return false;
    }
    if (service.labels[key] !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Renders labels as `{ a=1, b=2 }`, sorted by key, or `{}` when empty.
 */
export function formatLabels(labels: Labels): string {
  const parts = Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .sort();
  return parts.length === 0 ? "{}" : `{ ${parts.join(", ")} }`;
}
