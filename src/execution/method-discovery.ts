/**
 * Test method discovery
 * Builds the name -> callable table the driver runs from
 */

import { TestCase } from '../test-case.js';
import { TestDeclarationError } from './signals.js';

export const TEST_METHOD_PREFIX = 'test';

/**
 * A discovered test method, already bound to its test case
 */
export type TestMethod = () => unknown;

// Declared method names per prototype; scanned once per class
const declaredNamesCache = new WeakMap<object, readonly string[]>();

function isTestMethodName(name: string): boolean {
    return name.startsWith(TEST_METHOD_PREFIX);
}

function isFunctionProperty(target: object, name: string): boolean {
    const descriptor = Object.getOwnPropertyDescriptor(target, name);
    const value: unknown = descriptor?.value;
    return typeof value === 'function';
}

/**
 * Names of the `test*` methods declared on the prototype chain, most derived
 * class first, stopping at {@link TestCase}
 */
export function scanDeclaredTestMethods(prototype: object): readonly string[] {
    const cached = declaredNamesCache.get(prototype);
    if(cached) {
        return cached;
    }

    const names: string[] = [];
    const seen = new Set<string>();
    let current: object | null = prototype;

    while(current !== null && current !== TestCase.prototype && current !== Object.prototype) {
        for(const name of Object.getOwnPropertyNames(current)) {
            if(seen.has(name)) {
                continue;
            }
            seen.add(name);

            if(isTestMethodName(name) && isFunctionProperty(current, name)) {
                names.push(name);
            }
        }
        current = Object.getPrototypeOf(current);
    }

    declaredNamesCache.set(prototype, names);
    return names;
}

/**
 * Build the table of test methods for one test case instance.
 *
 * Sources, in order: methods declared on the class chain, `test*` function
 * properties set on the instance (arrow-function fields), and methods passed
 * to `registerTest`. A name may only come from one source.
 */
export function discoverTestMethods(testCase: TestCase): Map<string, TestMethod> {
    const table = new Map<string, TestMethod>();
    const prototype: object = Object.getPrototypeOf(testCase);

    const bind = (value: unknown): TestMethod | undefined => {
        if(typeof value !== 'function') {
            return undefined;
        }
        return () => Reflect.apply(value, testCase, []);
    };

    for(const name of scanDeclaredTestMethods(prototype)) {
        const method = bind(Reflect.get(prototype, name));
        if(method) {
            table.set(name, method);
        }
    }

    for(const name of Object.getOwnPropertyNames(testCase)) {
        const method = isTestMethodName(name) ? bind(Object.getOwnPropertyDescriptor(testCase, name)?.value) : undefined;
        if(method) {
            table.set(name, method);
        }
    }

    for(const [name, method] of testCase.getRegisteredTests()) {
        if(table.has(name)) {
            throw new TestDeclarationError(`Test method '${name}' is both declared and registered.`);
        }
        table.set(name, method);
    }

    return table;
}
