import { normalizeLocation, roundTo } from "./location-normalizer";

describe("normalizeLocation", () => {
  it("rounds accuracy and speed to two decimals", () => {
    expect(normalizeLocation({ Latitude: 51.5, Longitude: -0.12, Accuracy: 4.567, Speed: 12.3456 })).toEqual({
      latitude: 51.5,
      longitude: -0.12,
      accuracy: 4.57,
      speed: 12.35
    });
  });

  it("defaults missing accuracy and speed to zero and keeps missing coordinates null", () => {
    expect(normalizeLocation({})).toEqual({ latitude: null, longitude: null, accuracy: 0, speed: 0 });
  });

  it("ignores values that are not numbers", () => {
    expect(normalizeLocation({ Latitude: "51.5", Accuracy: null, Speed: "3" })).toEqual({
      latitude: null,
      longitude: null,
      accuracy: 0,
      speed: 0
    });
  });
});

describe("roundTo", () => {
  it("rounds to the requested number of digits", () => {
    expect(roundTo(1.004, 2)).toBe(1);
    expect(roundTo(3.456, 2)).toBe(3.46);
    expect(roundTo(7, 2)).toBe(7);
  });

  it("sends exact halfway values to the even neighbour", () => {
    expect(roundTo(0.125, 2)).toBe(0.12);
    expect(roundTo(0.375, 2)).toBe(0.38);
    expect(roundTo(2.625, 2)).toBe(2.62);
    expect(roundTo(-0.125, 2)).toBe(-0.12);
    expect(roundTo(2.675, 2)).toBe(2.67);
    expect(roundTo(0.5, 0)).toBe(0);
    expect(roundTo(1.5, 0)).toBe(2);
  });

  it("applies the same tie rule to accuracy and speed", () => {
    expect(normalizeLocation({ Accuracy: 4.125, Speed: 0.875 })).toMatchObject({ accuracy: 4.12, speed: 0.88 });
  });
});
