import { expect, test } from "vitest";
import { Types, classType, defineType } from "./defineType";

class Animal {}
class Dog extends Animal {}

test("Class tokens are memoized per constructor", () => {
  expect(classType(Animal)).toBe(classType(Animal));
  expect(classType(Dog)).not.toBe(classType(Animal));
  expect(classType(Dog).name).toBe("Dog");
});

test("Class tokens guard with instanceof", () => {
  expect(classType(Animal).is(new Dog())).toBe(true);
  expect(classType(Dog).is(new Animal())).toBe(false);
});

test("Defined tokens are distinct even with the same guard", () => {
  const isString = (value: unknown): value is string =>
    typeof value === "string";

  expect(defineType("Email", isString)).not.toBe(defineType("Email", isString));
});

test("Built-in tokens reject NaN and invalid dates", () => {
  expect(Types.number.is(Number.NaN)).toBe(false);
  expect(Types.date.is(new Date("invalid"))).toBe(false);
  expect(Types.object.is(null)).toBe(false);
});
