import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
  entries: [
    "./src/index",
    {
      input: "./src/core/index",
      name: "core/index",
    },
  ],
  declaration: true,
  rollup: {
    emitCJS: false,
  },
});
