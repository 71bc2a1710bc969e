export type Competitor = {
  /** Registration number announced by the timing feed; unique within a session. */
  id: string;
  carNumber: string;
  transponder: string | null;
  displayName: string;
};

const normaliseWhitespace = (value: string) => value.replace(/\s+/g, ' ').trim();

export const buildCompetitorDisplayName = (
  firstName: string,
  lastName: string,
  carNumber: string,
): string => {
  const fullName = normaliseWhitespace(`${firstName} ${lastName}`);
  return fullName.length > 0 ? fullName : `#${carNumber}`;
};

const INTEGER_ID = /^\d+$/;

/**
 * Total order over competitor ids. Purely numeric ids compare by value so that
 * kart "2" sorts before kart "10"; everything else falls back to code units.
 */
export const compareCompetitorIds = (left: string, right: string): number => {
  if (INTEGER_ID.test(left) && INTEGER_ID.test(right)) {
    const difference = Number(left) - Number(right);
    if (difference !== 0) {
      return difference;
    }
  }

  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
};
