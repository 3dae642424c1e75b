import path from "node:path";

export const bundleLayout = {
  scriptSlot: path.join("Contents", "Resources", "Scripts", "payload.sh"),
  iconSlot: path.join("Contents", "Resources", "applet.icns"),
} as const;

export const scriptSlotPath = (bundlePath: string) => path.join(bundlePath, bundleLayout.scriptSlot);

export const iconSlotPath = (bundlePath: string) => path.join(bundlePath, bundleLayout.iconSlot);
