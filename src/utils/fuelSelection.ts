/** Fuels the user has picked, remembered for the country they were picked in. */
export interface FuelSelection {
  country: string;
  fuels: ReadonlySet<string>;
}

/**
 * The fuel set to filter `country` with. A selection made for another country
 * does not carry over: the new country starts with all of its fuels.
 */
export const resolveSelectedFuels = (
  selection: FuelSelection | null,
  country: string,
  availableFuels: readonly string[]
): ReadonlySet<string> =>
  selection && selection.country === country ? selection.fuels : new Set(availableFuels);

export const toggleFuel = (fuels: ReadonlySet<string>, fuel: string): Set<string> => {
  const next = new Set(fuels);
  if (next.has(fuel)) {
    next.delete(fuel);
  } else {
    next.add(fuel);
  }
  return next;
};
