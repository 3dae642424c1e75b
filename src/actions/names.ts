// "login-window" <-> "Login Window". Lossy for acronyms: "USB Port" comes back as "Usb Port".

export const idToName = (id: string): string => {
  return id
    .split("-")
    .map((segment) => (segment ? segment.charAt(0).toUpperCase() + segment.slice(1) : segment))
    .join(" ");
};

export const nameToId = (name: string): string => {
  return name.replace(/ /g, "-").toLowerCase();
};

export const looksLikeDisplayName = (input: string): boolean => /[A-Z]/.test(input);

export const toDisplayName = (idOrName: string): string => {
  return looksLikeDisplayName(idOrName) ? idOrName : idToName(idOrName);
};
