/**
 * Template for crate-fusion.toml
 */

export const CONFIG_HEADER = `# crate-fusion configuration in TOML format.
#
# [impl_items]
# include = ["item_1", "item_2@impl Block"]
# exclude = ["*@impl Other"]
# [impl_blocks]
# include = ["impl Display for Value"]
# exclude = ["impl fmt::Display for Go"]
#
# If an item matches both an include and an exclude entry, include wins.
#
# --- impl items ---
# Impl items are named by their plain name:
#   fn my_function()  -> my_function
#   const MY_CONST    -> MY_CONST
# If several impl blocks define an item of that name (new, next, fmt, ...), qualify it
# with the fully qualified name of its impl block:
#   item_name@fully_qualified_block_name
#
# A fully qualified block name has up to four components, separated by one space:
#   1. impl with its generic parameters, e.g. impl<'a,T:Display>
#   2. for trait impls, the trait path followed by 'for', e.g. convert::From<&str> for
#   3. the self type path with its generic arguments, e.g. map::TwoDim<X,Y>
#   4. the where clause, if any, e.g. whereD:Display
# Write each component without whitespace.
#   impl<constX:usize,constY:usize> map::TwoDim<X,Y>
#   impl<'a> From<&'astr> for FooType<'a>
#   impl<D> MyPrint for MyType<D> whereD:Display
#
# The item name '*' selects every item of a block and requires the block name:
#   *@impl StructFoo
#
# --- impl blocks ---
# References through traits (Display, From, ...) cannot be found by following names.
# Add the impl blocks the program needs by their fully qualified name. Including a
# trait impl block includes all of its items.
# Items of an included impl block without a trait are offered in the impl item
# dialog, unless they are configured under [impl_items]. A block whose items are
# required is always part of the fusion; it does not need to be listed.
#
# --- fusion ---
# output = "src/bin/fusion_of_<challenge>.rs"
# default_impl_items = "include" | "exclude"
# interactive = true
`;

export function generateConfigContent(body: string): string {
  return `${CONFIG_HEADER}\n${body.trimEnd()}\n`;
}
