import {
  formatCompactStamp,
  formatFilenameStamp,
  formatUtcClock,
  formatUtcDateTime,
} from "../time";

describe("time formatting", () => {
  const date = new Date(Date.UTC(2024, 2, 9, 7, 5, 1));

  it("formatUtcDateTime pads every field and appends UTC", () => {
    expect(formatUtcDateTime(date)).toBe("2024-03-09 07:05:01 UTC");
  });

  it("formatUtcClock prints hours, minutes and seconds", () => {
    expect(formatUtcClock(date)).toBe("07:05:01");
  });

  it("formatCompactStamp prints date and time without separators", () => {
    expect(formatCompactStamp(date)).toBe("20240309-070501");
  });

  it("formatFilenameStamp keeps the string filename-safe", () => {
    expect(formatFilenameStamp(date)).toBe("2024-03-09-T07-05-01Z");
  });

  it("uses UTC regardless of the local offset", () => {
    const lateEvening = new Date(Date.UTC(2023, 11, 31, 23, 59, 59));
    expect(formatCompactStamp(lateEvening)).toBe("20231231-235959");
  });
});
