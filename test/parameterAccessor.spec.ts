import { describe, expect, test } from "vitest";
import {
  InvariantViolationError,
  PageRequest,
  type ParameterInput,
  Sort,
  createParameterAccessor,
  defineParameters,
} from "../src";

describe("ParameterAccessor", () => {
  describe("1. Construction", () => {
    const mismatches: [ParameterInput[], unknown[]][] = [
      [["bindable"], []],
      [[], ["value"]],
      [["bindable", "pageable"], ["a", null, "b"]],
      [["bindable", "sort", "bindable"], ["a"]],
    ];

    test.each(mismatches)("should reject %j with %j", (roles, values) => {
      expect(() =>
        createParameterAccessor(defineParameters(roles), values),
      ).toThrow(InvariantViolationError);
    });

    test("should reject missing parameters or values", () => {
      expect(() =>
        Reflect.apply(createParameterAccessor, undefined, [null, []]),
      ).toThrow("Parameters must not be null!");
      expect(() =>
        Reflect.apply(createParameterAccessor, undefined, [
          defineParameters([]),
          undefined,
        ]),
      ).toThrow("Values must not be null!");
    });

    test("should keep its own copy of the values", () => {
      const values = ["a", "b"];
      const accessor = createParameterAccessor(
        defineParameters(["bindable", "bindable"]),
        values,
      );

      values[0] = "changed";

      expect(accessor.getValue(0)).toBe("a");
      expect([...accessor.bindableValues()]).toEqual(["a", "b"]);
    });
  });

  describe("2. Pageable and Sort", () => {
    test("should expose pageable, sort and bindable values", () => {
      const byName = Sort.by("name");
      const pageable = PageRequest.of(0, 10, byName);
      const accessor = createParameterAccessor(
        defineParameters(["bindable", "pageable", "bindable"]),
        ["abc", pageable, null],
      );

      expect(accessor.getPageable()).toBe(pageable);
      expect(accessor.getSort()).toBe(byName);
      expect([...accessor.bindableValues()]).toEqual(["abc", null]);
      expect(accessor.hasAnyBindableNull()).toBe(true);
    });

    test("should return the explicit sort argument", () => {
      const sort = Sort.by("DESC", "createdAt");
      const accessor = createParameterAccessor(
        defineParameters(["bindable", "sort"]),
        ["abc", sort],
      );

      expect(accessor.getSort()).toBe(sort);
      expect(accessor.getPageable()).toBeNull();
    });

    test("should prefer the explicit sort over the sort of the page request", () => {
      const accessor = createParameterAccessor(
        defineParameters(["pageable", "sort"]),
        [PageRequest.of(0, 5, Sort.by("a")), Sort.by("b")],
      );

      expect(accessor.getSort()?.toString()).toBe("b: ASC");
    });

    test("should not fall back to the page request when the sort argument is null", () => {
      const accessor = createParameterAccessor(
        defineParameters(["pageable", "sort"]),
        [PageRequest.of(0, 5, Sort.by("a")), null],
      );

      expect(accessor.getSort()).toBeNull();
    });

    test("should return null for an absent page request", () => {
      const accessor = createParameterAccessor(
        defineParameters(["pageable", "bindable"]),
        [null, "abc"],
      );

      expect(accessor.getPageable()).toBeNull();
      expect(accessor.getSort()).toBeNull();
    });

    test("should return null for a page request without sort", () => {
      const parameters = defineParameters(["pageable"]);
      const accessor = createParameterAccessor(parameters, [
        PageRequest.of(3, 5),
      ]);

      expect(accessor.getPageable()?.offset).toBe(15);
      expect(accessor.getSort()).toBeNull();
    });

    test("should return null when the method takes neither", () => {
      const parameters = defineParameters(["bindable"]);
      const accessor = createParameterAccessor(parameters, [
        PageRequest.of(0, 5, Sort.by("a")),
      ]);

      expect(accessor.getPageable()).toBeNull();
      expect(accessor.getSort()).toBeNull();
    });

    test("should accept any pageable-shaped value", () => {
      const pageable = { pageNumber: 1, pageSize: 2, offset: 2, sort: null };
      const parameters = defineParameters(["pageable"]);
      const accessor = createParameterAccessor(parameters, [pageable]);

      expect(accessor.getPageable()).toBe(pageable);
    });

    test("should reject other values in the pageable and sort positions", () => {
      const accessor = createParameterAccessor(
        defineParameters(["pageable", "sort"]),
        [{ page: 1 }, "name"],
      );

      expect(() => accessor.getPageable()).toThrow(
        "Argument at position 0 is not a page request",
      );
      expect(() => accessor.getSort()).toThrow(
        "Argument at position 1 is not a sort",
      );
    });
  });

  describe("3. Bindable Values", () => {
    test("should yield bindable values in order, skipping special parameters", () => {
      const accessor = createParameterAccessor(
        defineParameters(["bindable", "sort", "bindable"]),
        ["first", Sort.by("a"), "third"],
      );

      expect(accessor.getBindableValue(0)).toBe("first");
      expect(accessor.getBindableValue(1)).toBe("third");
      expect([...accessor.bindableValues()]).toEqual(["first", "third"]);
      expect(accessor.hasAnyBindableNull()).toBe(false);
    });

    test("should treat undefined as null", () => {
      const accessor = createParameterAccessor(
        defineParameters(["bindable", "sort", "bindable"]),
        ["first", null, undefined],
      );

      expect(accessor.hasAnyBindableNull()).toBe(true);
      expect(accessor.getBindableValue(1)).toBeUndefined();
    });

    test("should ignore null special parameters when checking for nulls", () => {
      const accessor = createParameterAccessor(
        defineParameters(["pageable", "bindable"]),
        [null, 0],
      );

      expect(accessor.hasAnyBindableNull()).toBe(false);
    });

    test("should start a new traversal on every call", () => {
      const accessor = createParameterAccessor(
        defineParameters(["bindable", "pageable", "bindable"]),
        [1, null, 2],
      );

      const iterator = accessor.bindableValues();
      expect(iterator.next()).toEqual({ value: 1, done: false });
      expect(iterator.next()).toEqual({ value: 2, done: false });
      expect(iterator.next()).toEqual({ value: undefined, done: true });

      expect([...accessor.bindableValues()]).toEqual([1, 2]);
      expect([...accessor]).toEqual([1, 2]);
    });

    test("should yield nothing when there are no bindable parameters", () => {
      const parameters = defineParameters(["pageable"]);
      const accessor = createParameterAccessor(parameters, [
        PageRequest.of(0, 1),
      ]);

      expect([...accessor.bindableValues()]).toEqual([]);
      expect(accessor.hasAnyBindableNull()).toBe(false);
    });

    test("should look bindable values up by name", () => {
      const accessor = createParameterAccessor(
        defineParameters([
          { role: "bindable", name: "lastName" },
          "pageable",
          { role: "bindable", name: "status" },
        ]),
        ["Smith", null, "active"],
      );

      expect(accessor.getBindableValueByName("status")).toBe("active");
      expect(() => accessor.getBindableValueByName("age")).toThrow(
        'No bindable parameter named "age"',
      );
    });

    test("should reject unknown indexes", () => {
      const accessor = createParameterAccessor(
        defineParameters(["bindable", "pageable"]),
        ["a", null],
      );

      expect(() => accessor.getBindableValue(1)).toThrow(
        InvariantViolationError,
      );
      expect(() => accessor.getValue(2)).toThrow(
        "Invalid argument index 2, there are 2 arguments",
      );
      expect(accessor.getParameters().length).toBe(2);
    });
  });
});
