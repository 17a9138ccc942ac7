export function log(message: string, source = "ledgerline") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export function warn(message: string, source = "ledgerline") {
  console.warn(`[${source}] ${message}`);
}
