import "../setup";
import { describeStrength, scorePassword } from "../../src/password/strength";

describe("scorePassword", () => {
  it.each([
    ["", 0],
    ["zxcvbnm", 0],
    ["abcdefgh", 0],
    ["correcthorsebattery", 2],
    ["Password123!", 3],
    ["Tr0ub4dor&3", 4],
    ["Long-Enough-Passphrase-9", 4]
  ] as const)("scores %j as %i", (pw, expected) => {
    expect(scorePassword(pw)).toBe(expected);
  });

  it("counts only listed symbols", () => {
    // spaces and accented letters are not symbols
    expect(scorePassword("correct horse battery")).toBe(2);
    expect(scorePassword("pässwörter")).toBe(1);
    expect(scorePassword("under_score-dash")).toBe(2);
    expect(scorePassword("under_score-dash?")).toBe(3);
  });

  it("matches weak patterns case-insensitively", () => {
    // 12+ chars, both cases, digit, symbol = 5, minus "password" = 4
    expect(scorePassword("MyPASSWORD9!x")).toBe(4);
    // minus "abc" and "123" as well
    expect(scorePassword("ABCpassword123!")).toBe(2);
  });
});

describe("describeStrength", () => {
  it("labels every score", () => {
    expect(describeStrength(0)).toBe("Very Weak");
    expect(describeStrength(1)).toBe("Very Weak");
    expect(describeStrength(2)).toBe("Weak");
    expect(describeStrength(3)).toBe("Good");
    expect(describeStrength(4)).toBe("Strong");
  });
});
