import { type Static, Type } from "@sinclair/typebox";

export const ConnectionV1 = Type.Object({
  hostname: Type.String({ minLength: 1 }),
  username: Type.String({ minLength: 1 }),
  password: Type.Optional(
    Type.String({
      description: "Login password; `${VAR}` is replaced from the environment",
    })
  ),
  ssh_key_path: Type.Optional(Type.String({ minLength: 1 })),
  key_passphrase: Type.Optional(Type.String()),
  port: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
});
export type ConnectionV1 = Static<typeof ConnectionV1>;

// "0x1a86", "1a86" or a plain number
export const UsbIdV1 = Type.Union([
  Type.String({ pattern: "^(0[xX])?[0-9a-fA-F]{1,4}$" }),
  Type.Integer({ minimum: 0, maximum: 0xffff }),
]);
export type UsbIdV1 = Static<typeof UsbIdV1>;

export const DeviceV1 = Type.Object({
  vendor_id: UsbIdV1,
  product_id: UsbIdV1,
});
export type DeviceV1 = Static<typeof DeviceV1>;

export const ServicesV1 = Type.Object({
  compose_dir: Type.Optional(Type.String({ minLength: 1 })),
  systemd_services: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
});
export type ServicesV1 = Static<typeof ServicesV1>;

export const HostV1 = Type.Object({
  connection: ConnectionV1,
  services: Type.Optional(ServicesV1),
  devices: Type.Optional(Type.Record(Type.String(), DeviceV1)),
});
export type HostV1 = Static<typeof HostV1>;

export const InventoryV1 = Type.Object({
  hosts: Type.Record(Type.String(), HostV1),
});
export type InventoryV1 = Static<typeof InventoryV1>;
