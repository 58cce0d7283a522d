export { endsWith01 } from "./ends-with-01.js";
export { evenOnes } from "./even-ones.js";
export { lengthMod3 } from "./length-mod3.js";
export { isDivisibleByThree, mod3 } from "./mod3.js";
