import { parseHtml, type DocumentTree } from '@xsql/dom';

/**
 * Node ids (preorder):
 * 0 html, 1 head, 2 title, 3 body, 4 div#nav, 5 a[/home], 6 a[/docs].ext,
 * 7 a[""], 8 ul, 9 li.item, 10 li.item.sale, 11 li, 12 p, 13 a[mailto:x],
 * 14 a[name=top]
 */
export const SHOP_PAGE = [
  '<html><head><title>Shop</title></head><body>',
  '<div id="nav"><a href="/home">Home</a><a href="/docs" class="ext">Docs</a><a href="">Blank</a></div>',
  '<ul><li class="item">Apple pie</li><li class="item sale">Banana bread</li><li>Cherry tart</li></ul>',
  '<p>Contact <a href="mailto:x">us</a></p>',
  '<a name="top">Top</a>',
  '</body></html>',
].join('');

export function shopTree(): DocumentTree {
  return parseHtml(SHOP_PAGE, { sourceUri: 'shop.html' });
}
