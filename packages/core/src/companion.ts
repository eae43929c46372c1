/** Marks the static half of a type/value pair.
 *  For example, MessageDef (the type) and MessageDef (the companion object).
 *
 *  Does nothing at runtime; it exists so companions are easy to find.
 * */
export function StaticTypeCompanion<const Companion>(t: Companion): Companion {
  return t
}
