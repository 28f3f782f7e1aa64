import type { ApiRecord } from "../datasources/schemas";

export const TEST_BASE_URL = "https://api.test/ergast/f1";

function pad(value: number) {
  return String(value).padStart(2, "0");
}

export function calendarRace(year: number, round: number) {
  return {
    season: String(year),
    round: String(round),
    url: `https://example.test/${year}/${round}`,
    raceName: `Test Grand Prix ${round}`,
    date: `${year}-05-${pad(round)}`,
    Circuit: {
      circuitId: `circuit_${round}`,
      url: `https://example.test/circuits/${round}`,
      circuitName: `Circuit ${round}`,
      Location: {
        lat: "1.5",
        long: "2.5",
        locality: `Town ${round}`,
        country: `Country ${round}`,
      },
    },
  };
}

export function raceCalendar(year: number, rounds: number[]) {
  return {
    MRData: {
      RaceTable: {
        season: String(year),
        Races: rounds.map((round) => calendarRace(year, round)),
      },
    },
  };
}

export function roundPayload(
  year: number,
  round: number,
  key: string,
  items: ApiRecord[]
) {
  return {
    MRData: {
      RaceTable: {
        season: String(year),
        round: String(round),
        Races: [{ ...calendarRace(year, round), [key]: items }],
      },
    },
  };
}

export function standingsPayload(
  year: number,
  round: number,
  key: string,
  items: ApiRecord[]
) {
  return {
    MRData: {
      StandingsTable: {
        season: String(year),
        round: String(round),
        StandingsLists: [
          { season: String(year), round: String(round), [key]: items },
        ],
      },
    },
  };
}

export function driver(driverId: string, familyName: string) {
  return {
    driverId,
    code: driverId.slice(0, 3).toUpperCase(),
    givenName: "Test",
    familyName,
    nationality: "Nowhere",
  };
}

export function constructorEntry(constructorId: string) {
  return { constructorId, name: constructorId.toUpperCase() };
}

export function resultItem(position: number, driverId: string, familyName: string) {
  return {
    number: String(position * 10),
    position: String(position),
    positionText: String(position),
    points: String(26 - position),
    Driver: driver(driverId, familyName),
    Constructor: constructorEntry(`team_${driverId}`),
    grid: String(position),
    laps: "57",
    status: "Finished",
    Time: { millis: String(5400000 + position), time: "1:30:00" },
    FastestLap: {
      rank: String(position),
      lap: "44",
      Time: { time: "1:32.608" },
      AverageSpeed: { units: "kph", speed: "210.383" },
    },
  };
}

export function driverStandingItem(position: number, driverId: string) {
  return {
    position: String(position),
    positionText: String(position),
    points: String(50 - position),
    wins: "0",
    Driver: driver(driverId, driverId.toUpperCase()),
    Constructors: [constructorEntry(`team_${driverId}`)],
  };
}

export function seasonsPage(years: number[]) {
  return {
    MRData: {
      SeasonTable: {
        Seasons: years.map((year) => ({
          season: String(year),
          url: `https://example.test/seasons/${year}`,
        })),
      },
    },
  };
}
