import type {
  ClassDescriptor,
  ConstructorDescriptor,
  DestructorDescriptor,
  Entity,
  GetterDescriptor,
  MethodDescriptor,
  SetterDescriptor,
  StaticDescriptor,
} from "../types.js";

/** A built member, tagged with the slot it belongs in. */
export type ClassMember =
  | { kind: "constructor"; descriptor: ConstructorDescriptor }
  | { kind: "destructor"; descriptor: DestructorDescriptor }
  | { kind: "method"; descriptor: MethodDescriptor }
  | { kind: "static"; descriptor: StaticDescriptor }
  | { kind: "getter"; descriptor: GetterDescriptor }
  | { kind: "setter"; descriptor: SetterDescriptor };

export function createClassDescriptor(name: string, cName: string, e: Entity): ClassDescriptor {
  return {
    name,
    cName,
    comments: e.comment,
    statics: [],
    methods: [],
    getters: [],
    setters: [],
  };
}

/**
 * Attach a member to its class. Constructor and destructor slots keep the
 * last declaration seen; the lists keep declaration order.
 */
export function attachMember(cls: ClassDescriptor, member: ClassMember): void {
  switch (member.kind) {
    case "constructor":
      cls.ctor = member.descriptor;
      break;
    case "destructor":
      cls.dtor = member.descriptor;
      break;
    case "method":
      cls.methods.push(member.descriptor);
      break;
    case "static":
      cls.statics.push(member.descriptor);
      break;
    case "getter":
      cls.getters.push(member.descriptor);
      break;
    case "setter":
      cls.setters.push(member.descriptor);
      break;
    default: {
      const unreachable: never = member;
      throw new Error(`Unhandled member: ${JSON.stringify(unreachable)}`);
    }
  }
}
