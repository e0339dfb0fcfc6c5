/** "remote_preference" -> "Remote Preference" */
export function slotDisplayName(slot: string): string {
  return slot
    .split("_")
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(" ");
}

export function clarificationPrompt(slot: string, oldValue?: string, newValue?: string): string {
  const display = slotDisplayName(slot);
  if (oldValue && newValue) {
    return `I noticed you mentioned ${newValue} for your ${display}, but I previously had ${oldValue}. Which one is correct?`;
  }
  if (newValue) {
    return `Just to confirm - is your ${display} ${newValue}? I want to make sure I have this right.`;
  }
  return `Can you confirm your ${display}?`;
}
