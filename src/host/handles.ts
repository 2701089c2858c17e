// Kinds of objects the platform binding hands out references to.
export type HandleKind = "application" | "document" | "sheet" | "range";

// Opaque reference to an object living inside the host process. The `ref`
// is whatever the binding uses to find the object again (a bridge id, a
// pointer, a fake's key); nothing outside the binding interprets it.
export class HostHandle<Kind extends HandleKind = HandleKind> {
  constructor(
    readonly kind: Kind,
    readonly ref: string
  ) {}

  toString(): string {
    return `${this.kind}:${this.ref}`;
  }
}

export type ApplicationHandle = HostHandle<"application">;
export type DocumentHandle = HostHandle<"document">;
export type SheetHandle = HostHandle<"sheet">;
export type RangeHandle = HostHandle<"range">;
