import type { NewStudent } from "../model/student";

// Ids stay raw until dispatch so a malformed one is reported like any
// other failure instead of as a usage error.
export type StudentCommand =
  | { readonly _tag: "ListAll" }
  | { readonly _tag: "Add"; readonly student: NewStudent }
  | {
      readonly _tag: "UpdateEmail";
      readonly id: string;
      readonly email: string;
    }
  | { readonly _tag: "Delete"; readonly id: string };
